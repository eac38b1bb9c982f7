export type {
  CheckOutcome,
  CheckReport,
  Classification,
  ClassificationResult,
  InventoryClient,
} from './types.js';
export { ConfigurationError, DataConsistencyError } from './errors.js';

// Core
export type { ItemFilter } from './storage/filter.js';
export { compileFilter, isAllowed } from './storage/filter.js';
export type { Tally } from './storage/tally.js';
export { IGNORED, createTally, increment, tallyEntries } from './storage/tally.js';
export type { LunIndex } from './storage/lun-index.js';
export { buildLunIndex, discKeyOf, resolveSlot, slotLabel } from './storage/lun-index.js';
export type { AdapterStatus, KnownAdapterStatus } from './storage/adapters.js';
export {
  adapterSeverity,
  classifyAdapters,
  parseAdapterStatus,
} from './storage/adapters.js';
export { classifyLuns, lunSeverity, sanitizeDisplayName } from './storage/luns.js';
export { buildReport } from './storage/report.js';
export { ADAPTER_LABEL, LUN_LABEL, runStorageCheck } from './storage/index.js';

// Integrations
export type { FetchFn, FetchOptions } from './integrations/tls-fetch.js';
export { buildFetch } from './integrations/tls-fetch.js';
export type { VcenterConnection } from './integrations/vcenter.js';
export { createVcenterClient } from './integrations/vcenter.js';
