import { ConfigurationError, type VcenterConnection } from '@storagecheck/checks';
import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_VIJSON_RELEASE } from '@storagecheck/shared';
import type { ParsedArgs } from './cli/args.js';

export interface ConnectionConfig extends VcenterConnection {
  /** Skip TLS certificate verification */
  insecure: boolean;
  timeoutMs: number;
}

function required(value: string | undefined, flag: string, envVar: string): string {
  if (!value) {
    throw new ConfigurationError(`${flag} or ${envVar} is required`);
  }
  return value;
}

function toEndpoint(host: string): string {
  return /^https?:\/\//i.test(host) ? host : `https://${host}`;
}

function toTimeoutMs(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_REQUEST_TIMEOUT_MS;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`--timeout must be a positive number of seconds, got "${raw}"`);
  }
  return seconds * 1000;
}

/**
 * Connection settings for vCenter. Command-line flags win over the
 * VSPHERE_* environment variables.
 */
export function loadConnectionConfig(
  args: ParsedArgs,
  env: NodeJS.ProcessEnv = process.env,
): ConnectionConfig {
  const host = required(args.values.host ?? env.VSPHERE_HOST, '--host', 'VSPHERE_HOST');
  const username = required(args.values.user ?? env.VSPHERE_USER, '--user', 'VSPHERE_USER');
  const password = required(args.values.password ?? env.VSPHERE_PASS, '--password', 'VSPHERE_PASS');

  return {
    endpoint: toEndpoint(host),
    username,
    password,
    apiRelease: args.values.apiRelease ?? env.VSPHERE_API_RELEASE ?? DEFAULT_VIJSON_RELEASE,
    timeoutMs: toTimeoutMs(args.values.timeout ?? env.VSPHERE_TIMEOUT),
    insecure: args.nossl || env.VSPHERE_NOSSL === 'true',
  };
}
