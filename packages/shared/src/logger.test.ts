import { describe, expect, it } from 'vitest';
import { resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('defaults to warn when LOG_LEVEL is unset', () => {
    expect(resolveLogLevel(undefined)).toBe('warn');
  });

  it('accepts known levels regardless of case', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel(' INFO ')).toBe('info');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to warn for an unknown level', () => {
    expect(resolveLogLevel('verbose')).toBe('warn');
    expect(resolveLogLevel('')).toBe('warn');
  });
});
