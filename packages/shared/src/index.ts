// Types
export {
  Severity,
  CheckMode,
  OutcomeKind,
  SEVERITY_EXIT_CODES,
  SEVERITY_RANK,
  CHECK_SHORTNAME,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_VIJSON_RELEASE,
} from './types/common.js';

// Severity lattice
export { exitCodeOf, worstSeverity } from './severity.js';

// Schemas: Storage
export {
  HostBusAdapter,
  ScsiLun,
  ScsiTopologyLun,
  ScsiTopologyTarget,
  ScsiTopologyInterface,
  StorageDeviceInfo,
} from './schemas/storage.js';
export type { HostRecord } from './schemas/storage.js';

// Schemas: vSphere payloads
export {
  ManagedObjectReference,
  HostSummary,
  HostSummaryList,
  HostRuntime,
  HostConfigManager,
} from './schemas/vsphere.js';

// Schemas: Check options
export { CheckOptions } from './schemas/check.js';

// Logging
export { logger } from './logger.js';
