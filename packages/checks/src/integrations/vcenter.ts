import {
  DEFAULT_VIJSON_RELEASE,
  HostConfigManager,
  type HostRecord,
  HostRuntime,
  HostSummaryList,
  StorageDeviceInfo,
  logger,
} from '@storagecheck/shared';
import { z } from 'zod';
import type { InventoryClient } from '../types.js';
import type { FetchFn } from './tls-fetch.js';

export interface VcenterConnection {
  /** Base URL, e.g. https://vcenter.example.local */
  endpoint: string;
  username: string;
  password: string;
  /** VI/JSON release path segment, e.g. "8.0.1.0" */
  apiRelease?: string;
}

const log = logger.child({ component: 'vcenter' });

function baseUrl(connection: VcenterConnection): string {
  return connection.endpoint.replace(/\/$/, '');
}

function expectOk(res: Response, api: string): void {
  if (!res.ok) {
    throw new Error(`vCenter ${api} returned ${res.status}: ${res.statusText}`);
  }
}

/**
 * Inventory client backed by vCenter. Host lookup goes through the REST
 * API (`/api`), property reads through VI/JSON (`/sdk/vim25`). Each API
 * gets its own session, opened lazily and reused for the client's lifetime.
 */
export function createVcenterClient(
  connection: VcenterConnection,
  fetchFn: FetchFn,
): InventoryClient {
  const base = baseUrl(connection);
  const release = connection.apiRelease ?? DEFAULT_VIJSON_RELEASE;

  let restSession: Promise<string> | undefined;
  let vimSession: Promise<string> | undefined;

  // --- Sessions ---

  async function openRestSession(): Promise<string> {
    const encoded = Buffer.from(`${connection.username}:${connection.password}`).toString('base64');
    log.debug({ endpoint: base }, 'opening REST session');
    const res = await fetchFn(`${base}/api/session`, {
      method: 'POST',
      headers: { Authorization: `Basic ${encoded}`, Accept: 'application/json' },
    });
    expectOk(res, 'session auth');
    return z.string().parse(await res.json()).replace(/^"|"$/g, '');
  }

  async function openVimSession(): Promise<string> {
    log.debug({ endpoint: base, release }, 'opening VI/JSON session');
    const res = await fetchFn(`${base}/sdk/vim25/${release}/SessionManager/SessionManager/Login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify({ userName: connection.username, password: connection.password }),
    });
    expectOk(res, 'VI/JSON login');
    const token = res.headers.get('vmware-api-session-id');
    if (!token) {
      throw new Error('vCenter VI/JSON login returned no vmware-api-session-id header');
    }
    return token;
  }

  function restToken(): Promise<string> {
    restSession ??= openRestSession();
    return restSession;
  }

  function vimToken(): Promise<string> {
    vimSession ??= openVimSession();
    return vimSession;
  }

  // --- Requests ---

  async function restGet<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params?: Record<string, string>,
  ): Promise<z.infer<S>> {
    const token = await restToken();
    const url = new URL(`${base}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, value);
    }
    log.debug({ path }, 'REST GET');
    const res = await fetchFn(url.toString(), {
      headers: { Accept: 'application/json', 'vmware-api-session-id': token },
    });
    expectOk(res, 'API');
    return schema.parse(await res.json());
  }

  async function vimGet<S extends z.ZodTypeAny>(
    moType: string,
    moId: string,
    property: string,
    schema: S,
  ): Promise<z.infer<S>> {
    const token = await vimToken();
    const path = `/sdk/vim25/${release}/${moType}/${encodeURIComponent(moId)}/${property}`;
    log.debug({ path }, 'VI/JSON GET');
    const res = await fetchFn(`${base}${path}`, {
      headers: { Accept: 'application/json', 'vmware-api-session-id': token },
    });
    expectOk(res, 'VI/JSON API');
    return schema.parse(await res.json());
  }

  // --- Inventory ---

  return {
    async findHost(name: string): Promise<HostRecord | undefined> {
      const hosts = await restGet('/api/vcenter/host', HostSummaryList, { names: name });
      const summary = hosts.find((h) => h.name === name);
      if (!summary) return undefined;

      const runtime = await vimGet('HostSystem', summary.host, 'runtime', HostRuntime);
      const configManager = await vimGet(
        'HostSystem',
        summary.host,
        'configManager',
        HostConfigManager,
      );
      if (!configManager.storageSystem) {
        throw new Error(`host ${name} exposes no storage system`);
      }

      return {
        name: summary.name,
        id: summary.host,
        inMaintenanceMode: runtime.inMaintenanceMode,
        storageSystem: configManager.storageSystem.value,
      };
    },

    async getStorageDeviceInfo(host: HostRecord) {
      return vimGet('HostStorageSystem', host.storageSystem, 'storageDeviceInfo', StorageDeviceInfo);
    },
  };
}
