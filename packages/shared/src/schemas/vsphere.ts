import { z } from 'zod';

export const ManagedObjectReference = z.object({
  type: z.string(),
  value: z.string(),
});
export type ManagedObjectReference = z.infer<typeof ManagedObjectReference>;

/** Entry of `GET /api/vcenter/host` */
export const HostSummary = z.object({
  host: z.string(),
  name: z.string(),
});
export type HostSummary = z.infer<typeof HostSummary>;

export const HostSummaryList = z.array(HostSummary);

/** Subset of `HostSystem.runtime` */
export const HostRuntime = z.object({
  inMaintenanceMode: z.boolean(),
});
export type HostRuntime = z.infer<typeof HostRuntime>;

/** Subset of `HostSystem.configManager` */
export const HostConfigManager = z.object({
  storageSystem: ManagedObjectReference.optional(),
});
export type HostConfigManager = z.infer<typeof HostConfigManager>;
