import type { ScsiLun, Severity } from '@storagecheck/shared';
import type { Classification, ClassificationResult } from '../types.js';
import { type ItemFilter, isAllowed } from './filter.js';
import { type LunIndex, resolveSlot } from './lun-index.js';
import { IGNORED, createTally, increment } from './tally.js';

const DISALLOWED_NAME_CHARS = /[^\p{L}\p{N}_ [\]().-]/gu;

/** Keeps word characters, space, brackets, parentheses, `_`, `-` and `.` */
export function sanitizeDisplayName(name: string): string {
  return name.replace(DISALLOWED_NAME_CHARS, '');
}

/** `degraded` anywhere wins over a leading `ok`; everything else is critical. */
export function lunSeverity(operationalState: readonly string[]): Severity {
  if (operationalState.includes('degraded')) return 'WARNING';
  if (operationalState[0] === 'ok') return 'OK';
  return 'CRITICAL';
}

function lunMessage(severity: Severity, slot: string, name: string, state: string): string {
  const verb = severity === 'WARNING' ? 'degraded' : 'state';
  return `${severity} LUN:${slot} ${name} ${verb}: ${state}`;
}

/**
 * Classifies SCSI LUNs in input order, labelling each with its slot from
 * the topology index. Throws DataConsistencyError when a LUN that passed
 * the filter has no slot.
 */
export function classifyLuns(
  luns: readonly ScsiLun[],
  lunIndex: LunIndex,
  filter: ItemFilter,
): Classification {
  const results: ClassificationResult[] = [];
  let tally = createTally(['ok', 'warning', 'critical']);

  for (const lun of luns) {
    const name = sanitizeDisplayName(lun.displayName);
    if (!isAllowed([name], filter)) {
      tally = increment(tally, IGNORED);
      continue;
    }

    const slot = resolveSlot(lunIndex, lun.key);
    const state = lun.operationalState.join('-');
    const severity = lunSeverity(lun.operationalState);
    results.push({ severity, message: lunMessage(severity, slot, name, state) });
    tally = increment(tally, severity.toLowerCase());
  }

  return { results, tally, total: luns.length };
}
