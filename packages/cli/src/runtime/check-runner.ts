import {
  type CheckOutcome,
  ConfigurationError,
  DataConsistencyError,
  type InventoryClient,
  compileFilter,
  runStorageCheck,
} from '@storagecheck/checks';
import { type CheckOptions, logger } from '@storagecheck/shared';

/**
 * Turns a failure into an UNKNOWN outcome. Configuration and data errors
 * keep their own kind so they read differently from a failed request.
 */
export function outcomeFromError(err: unknown): CheckOutcome {
  if (err instanceof ConfigurationError) {
    logger.warn({ err: err.message }, 'configuration error');
    return {
      kind: 'configuration-error',
      severity: 'UNKNOWN',
      message: `configuration error: ${err.message}`,
    };
  }
  if (err instanceof DataConsistencyError) {
    logger.warn({ err: err.message }, 'inconsistent storage snapshot');
    return {
      kind: 'data-error',
      severity: 'UNKNOWN',
      message: `data consistency error: ${err.message}`,
    };
  }
  const message = err instanceof Error ? err.message : String(err);
  logger.error({ err }, 'storage check failed');
  return { kind: 'internal-error', severity: 'UNKNOWN', message };
}

/**
 * Runs one storage check against the inventory. Patterns are compiled
 * before any remote call; a host in maintenance short-circuits with the
 * configured severity and no storage fetch.
 */
export async function runHostStorageCheck(
  options: CheckOptions,
  client: InventoryClient,
): Promise<CheckOutcome> {
  try {
    const filter = compileFilter(options.allowed, options.banned);

    const host = await client.findHost(options.host);
    if (!host) {
      return { kind: 'host-not-found', severity: 'UNKNOWN', message: `host ${options.host} not found` };
    }

    if (host.inMaintenanceMode) {
      return {
        kind: 'maintenance',
        severity: options.maintenanceState,
        message: `host ${options.host} is in maintenance`,
      };
    }

    const storage = await client.getStorageDeviceInfo(host);
    const report = runStorageCheck(storage, options.mode, filter);
    return { kind: 'result', severity: report.severity, message: report.message };
  } catch (err: unknown) {
    return outcomeFromError(err);
  }
}
