import { ConfigurationError } from '../errors.js';

/** Compiled allow/deny patterns */
export interface ItemFilter {
  allowed: RegExp[];
  banned: RegExp[];
}

function compilePatterns(patterns: readonly string[], option: string): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`invalid ${option} pattern "${pattern}": ${reason}`);
    }
  });
}

/**
 * Compiles both pattern lists. Throws ConfigurationError on the first
 * pattern that is not a valid regular expression.
 */
export function compileFilter(allowed: readonly string[], banned: readonly string[]): ItemFilter {
  return {
    allowed: compilePatterns(allowed, '--allowed'),
    banned: compilePatterns(banned, '--banned'),
  };
}

/**
 * Deny first, allow else. A candidate hitting any banned pattern excludes
 * the item; otherwise an empty allow list admits everything and a
 * non-empty one needs at least one candidate to match one pattern.
 * Patterns search anywhere in the candidate.
 */
export function isAllowed(candidates: readonly string[], filter: ItemFilter): boolean {
  if (candidates.some((c) => filter.banned.some((re) => re.test(c)))) {
    return false;
  }
  if (filter.allowed.length === 0) {
    return true;
  }
  return candidates.some((c) => filter.allowed.some((re) => re.test(c)));
}
