import { type Logger, destination, pino } from 'pino';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/** Level from LOG_LEVEL; anything pino does not know falls back to `warn`. */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const parsed = LogLevel.safeParse(raw?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'warn';
}

/**
 * Process-wide logger. Writes to stderr so plugin output on stdout is
 * never interleaved with diagnostics.
 */
export const logger: Logger = pino(
  {
    name: 'check-host-storage',
    level: resolveLogLevel(process.env.LOG_LEVEL),
  },
  destination(2),
);
