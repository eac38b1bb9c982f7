import { z } from 'zod';

export const Severity = z.enum(['OK', 'WARNING', 'CRITICAL', 'UNKNOWN']);
export type Severity = z.infer<typeof Severity>;

export const CheckMode = z.enum(['adapter', 'lun']);
export type CheckMode = z.infer<typeof CheckMode>;

export const OutcomeKind = z.enum([
  'result',
  'host-not-found',
  'maintenance',
  'configuration-error',
  'data-error',
  'internal-error',
]);
export type OutcomeKind = z.infer<typeof OutcomeKind>;

/** Plugin exit codes understood by Nagios-compatible schedulers */
export const SEVERITY_EXIT_CODES: Readonly<Record<Severity, number>> = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3,
};

/** Aggregation precedence: higher rank wins. CRITICAL outranks UNKNOWN. */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  OK: 0,
  WARNING: 1,
  UNKNOWN: 2,
  CRITICAL: 3,
};

/** Short name printed at the start of every plugin output line */
export const CHECK_SHORTNAME = 'VSPHERE-STORAGE';

/** Default per-request timeout against vCenter in milliseconds */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** VI/JSON release segment used when none is configured */
export const DEFAULT_VIJSON_RELEASE = '8.0.1.0';
