import type { CheckOutcome } from '@storagecheck/checks';
import { CHECK_SHORTNAME, exitCodeOf } from '@storagecheck/shared';

/** `VSPHERE-STORAGE <SEVERITY> - <message>` */
export function formatOutput(outcome: CheckOutcome): string {
  return `${CHECK_SHORTNAME} ${outcome.severity} - ${outcome.message}`;
}

export function exitCodeFor(outcome: CheckOutcome): number {
  return exitCodeOf(outcome.severity);
}
