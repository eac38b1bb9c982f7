import { z } from 'zod';

/**
 * Host bus adapter as reported in `HostStorageDeviceInfo.hostBusAdapter`.
 * `status` stays a free-form string; classification narrows it.
 */
export const HostBusAdapter = z.object({
  key: z.string(),
  device: z.string(),
  model: z.string(),
  status: z.string(),
});
export type HostBusAdapter = z.infer<typeof HostBusAdapter>;

/** SCSI logical unit from `HostStorageDeviceInfo.scsiLun` */
export const ScsiLun = z.object({
  key: z.string(),
  uuid: z.string().optional(),
  canonicalName: z.string().optional(),
  displayName: z.string().default(''),
  /** Lowercase state tokens, e.g. ["ok"] or ["degraded", "lostCommunication"] */
  operationalState: z.array(z.string()).default([]),
});
export type ScsiLun = z.infer<typeof ScsiLun>;

export const ScsiTopologyLun = z.object({
  key: z.string(),
  /** Slot number within the adapter/target path */
  lun: z.number().int(),
  /** Key of the ScsiLun this association points at */
  scsiLun: z.string(),
});
export type ScsiTopologyLun = z.infer<typeof ScsiTopologyLun>;

export const ScsiTopologyTarget = z.object({
  key: z.string(),
  lun: z.array(ScsiTopologyLun).default([]),
});
export type ScsiTopologyTarget = z.infer<typeof ScsiTopologyTarget>;

export const ScsiTopologyInterface = z.object({
  key: z.string(),
  target: z.array(ScsiTopologyTarget).default([]),
});
export type ScsiTopologyInterface = z.infer<typeof ScsiTopologyInterface>;

/**
 * Storage snapshot of one host. Parses the raw VI/JSON property and
 * exposes it under stable names; arrays the API omits become empty.
 */
export const StorageDeviceInfo = z
  .object({
    hostBusAdapter: z.array(HostBusAdapter).default([]),
    scsiLun: z.array(ScsiLun).default([]),
    scsiTopology: z
      .object({ adapter: z.array(ScsiTopologyInterface).default([]) })
      .default({}),
  })
  .transform((raw) => ({
    hostBusAdapters: raw.hostBusAdapter,
    scsiLuns: raw.scsiLun,
    scsiTopology: raw.scsiTopology.adapter,
  }));
export type StorageDeviceInfo = z.infer<typeof StorageDeviceInfo>;

/** Host as resolved from the inventory */
export interface HostRecord {
  /** Inventory name used for the lookup */
  name: string;
  /** Managed object id, e.g. "host-42" */
  id: string;
  inMaintenanceMode: boolean;
  /** Managed object id of the host's HostStorageSystem */
  storageSystem: string;
}
