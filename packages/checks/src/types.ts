import type { HostRecord, OutcomeKind, Severity, StorageDeviceInfo } from '@storagecheck/shared';
import type { Tally } from './storage/tally.js';

/** One classified adapter or LUN */
export interface ClassificationResult {
  severity: Severity;
  message: string;
}

/** Output of a classifier: results in input order plus outcome counts */
export interface Classification {
  results: ClassificationResult[];
  tally: Tally;
  /** Number of input items, ignored ones included */
  total: number;
}

/** Aggregated report of one storage check */
export interface CheckReport {
  severity: Severity;
  summary: string;
  details: string[];
  message: string;
}

/** Final result of a run, handed to the output sink */
export interface CheckOutcome {
  kind: OutcomeKind;
  severity: Severity;
  message: string;
}

/** Source of host and storage data; implemented against vCenter, faked in tests */
export interface InventoryClient {
  findHost(name: string): Promise<HostRecord | undefined>;
  getStorageDeviceInfo(host: HostRecord): Promise<StorageDeviceInfo>;
}
