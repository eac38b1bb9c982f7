import type { CheckMode, StorageDeviceInfo } from '@storagecheck/shared';
import type { CheckReport } from '../types.js';
import { classifyAdapters } from './adapters.js';
import type { ItemFilter } from './filter.js';
import { buildLunIndex } from './lun-index.js';
import { classifyLuns } from './luns.js';
import { buildReport } from './report.js';

export const ADAPTER_LABEL = 'Adapters';
export const LUN_LABEL = 'LUNs:';

/** Runs the classifier selected by `mode` over one snapshot and aggregates it */
export function runStorageCheck(
  storage: StorageDeviceInfo,
  mode: CheckMode,
  filter: ItemFilter,
): CheckReport {
  switch (mode) {
    case 'adapter':
      return buildReport(classifyAdapters(storage.hostBusAdapters, filter), ADAPTER_LABEL);
    case 'lun': {
      const lunIndex = buildLunIndex(storage.scsiTopology);
      return buildReport(classifyLuns(storage.scsiLuns, lunIndex, filter), LUN_LABEL);
    }
  }
}
