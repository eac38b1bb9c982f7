import { SEVERITY_EXIT_CODES, SEVERITY_RANK, type Severity } from './types/common.js';

/** Worst severity of the given list; OK when the list is empty. */
export function worstSeverity(severities: Iterable<Severity>): Severity {
  let worst: Severity = 'OK';
  for (const severity of severities) {
    if (SEVERITY_RANK[severity] > SEVERITY_RANK[worst]) {
      worst = severity;
    }
  }
  return worst;
}

export function exitCodeOf(severity: Severity): number {
  return SEVERITY_EXIT_CODES[severity];
}
