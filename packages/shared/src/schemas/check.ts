import { z } from 'zod';
import { CheckMode, Severity } from '../types/common.js';

/**
 * Options of a single storage check run. Patterns are still strings here;
 * compiling them is part of the run so that a bad pattern fails it.
 */
export const CheckOptions = z.object({
  /** Inventory name of the ESXi host */
  host: z.string().min(1, 'host name must not be empty'),
  mode: CheckMode,
  /** Severity reported when the host is in maintenance mode */
  maintenanceState: Severity.default('UNKNOWN'),
  allowed: z.array(z.string()).default([]),
  banned: z.array(z.string()).default([]),
});
export type CheckOptions = z.infer<typeof CheckOptions>;
