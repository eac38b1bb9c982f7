import type { HostBusAdapter, Severity } from '@storagecheck/shared';
import type { Classification, ClassificationResult } from '../types.js';
import { type ItemFilter, isAllowed } from './filter.js';
import { IGNORED, createTally, increment } from './tally.js';

const KNOWN_ADAPTER_STATUSES = ['online', 'unbound', 'unknown', 'offline'] as const;
export type KnownAdapterStatus = (typeof KNOWN_ADAPTER_STATUSES)[number];

export type AdapterStatus =
  | { kind: 'known'; status: KnownAdapterStatus }
  | { kind: 'unrecognized'; raw: string };

const ADAPTER_STATUS_SEVERITY: Readonly<Record<KnownAdapterStatus, Severity>> = {
  online: 'OK',
  unbound: 'WARNING',
  unknown: 'CRITICAL',
  offline: 'CRITICAL',
};

const KNOWN_STATUS_NAMES: readonly string[] = KNOWN_ADAPTER_STATUSES;

function isKnownStatus(value: string): value is KnownAdapterStatus {
  return KNOWN_STATUS_NAMES.includes(value);
}

export function parseAdapterStatus(raw: string): AdapterStatus {
  return isKnownStatus(raw) ? { kind: 'known', status: raw } : { kind: 'unrecognized', raw };
}

export function adapterSeverity(status: AdapterStatus): Severity {
  return status.kind === 'known' ? ADAPTER_STATUS_SEVERITY[status.status] : 'UNKNOWN';
}

export function adapterCandidates(adapter: HostBusAdapter): string[] {
  return [`device:${adapter.device}`, `model:${adapter.model}`, `key:${adapter.key}`];
}

/**
 * Classifies host bus adapters in input order. Filtered adapters only
 * count as ignored; every other adapter yields one result and bumps the
 * tally under its raw status.
 */
export function classifyAdapters(
  adapters: readonly HostBusAdapter[],
  filter: ItemFilter,
): Classification {
  const results: ClassificationResult[] = [];
  let tally = createTally(KNOWN_ADAPTER_STATUSES);

  for (const adapter of adapters) {
    if (!isAllowed(adapterCandidates(adapter), filter)) {
      tally = increment(tally, IGNORED);
      continue;
    }

    const severity = adapterSeverity(parseAdapterStatus(adapter.status));
    results.push({ severity, message: `${adapter.model} ${adapter.device} (${adapter.status})` });
    tally = increment(tally, adapter.status);
  }

  return { results, tally, total: adapters.length };
}
