import { describe, expect, it, vi } from 'vitest';
import { createVcenterClient } from './vcenter.js';

const CONNECTION = {
  endpoint: 'https://vcenter.test.local/',
  username: 'monitor@vsphere.local',
  password: 'test-secret',
  apiRelease: '8.0.2.0',
};

const VIM = '/sdk/vim25/8.0.2.0';

function json(body: unknown, init?: ResponseInit): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

type Route = () => Response;

function routedFetch(routes: Record<string, Route>) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input : input.url);
    const route = routes[url.pathname];
    if (!route) return new Response('Not Found', { status: 404, statusText: 'Not Found' });
    return route();
  });
}

function callArgs(fn: ReturnType<typeof routedFetch>, index: number): [string, RequestInit] {
  const args = fn.mock.calls[index];
  if (!args) throw new Error(`No call at index ${index}`);
  return [String(args[0]), args[1] ?? {}];
}

const DEFAULT_ROUTES: Record<string, Route> = {
  '/api/session': () => json('rest-token'),
  '/api/vcenter/host': () =>
    json([
      { host: 'host-17', name: 'esx01.test.local', connection_state: 'CONNECTED' },
    ]),
  [`${VIM}/SessionManager/SessionManager/Login`]: () =>
    json({ key: 'session' }, { headers: { 'vmware-api-session-id': 'vim-token' } }),
  [`${VIM}/HostSystem/host-17/runtime`]: () =>
    json({ _typeName: 'HostRuntimeInfo', inMaintenanceMode: false, connectionState: 'connected' }),
  [`${VIM}/HostSystem/host-17/configManager`]: () =>
    json({
      _typeName: 'HostConfigManager',
      storageSystem: { _typeName: 'ManagedObjectReference', type: 'HostStorageSystem', value: 'storageSystem-17' },
    }),
  [`${VIM}/HostStorageSystem/storageSystem-17/storageDeviceInfo`]: () =>
    json({
      _typeName: 'HostStorageDeviceInfo',
      hostBusAdapter: [
        { key: 'key-vim.host.BlockHba-vmhba0', device: 'vmhba0', model: 'SATA AHCI', status: 'online' },
      ],
    }),
};

describe('createVcenterClient', () => {
  describe('findHost', () => {
    it('resolves the host record through REST and VI/JSON', async () => {
      const fetchFn = routedFetch(DEFAULT_ROUTES);
      const client = createVcenterClient(CONNECTION, fetchFn);

      const host = await client.findHost('esx01.test.local');
      expect(host).toEqual({
        name: 'esx01.test.local',
        id: 'host-17',
        inMaintenanceMode: false,
        storageSystem: 'storageSystem-17',
      });
    });

    it('authenticates the REST session with basic auth', async () => {
      const fetchFn = routedFetch(DEFAULT_ROUTES);
      await createVcenterClient(CONNECTION, fetchFn).findHost('esx01.test.local');

      const [url, init] = callArgs(fetchFn, 0);
      expect(url).toBe('https://vcenter.test.local/api/session');
      expect(init.method).toBe('POST');
      const expected = Buffer.from('monitor@vsphere.local:test-secret').toString('base64');
      expect(init.headers).toMatchObject({ Authorization: `Basic ${expected}` });
    });

    it('queries hosts by name with the REST session token', async () => {
      const fetchFn = routedFetch(DEFAULT_ROUTES);
      await createVcenterClient(CONNECTION, fetchFn).findHost('esx01.test.local');

      const [url, init] = callArgs(fetchFn, 1);
      expect(url).toBe('https://vcenter.test.local/api/vcenter/host?names=esx01.test.local');
      expect(init.headers).toMatchObject({ 'vmware-api-session-id': 'rest-token' });
    });

    it('sends the VI/JSON credentials as JSON and reuses the session', async () => {
      const fetchFn = routedFetch(DEFAULT_ROUTES);
      await createVcenterClient(CONNECTION, fetchFn).findHost('esx01.test.local');

      const [, login] = callArgs(fetchFn, 2);
      expect(JSON.parse(String(login.body))).toEqual({
        userName: 'monitor@vsphere.local',
        password: 'test-secret',
      });
      const [runtimeUrl, runtime] = callArgs(fetchFn, 3);
      expect(runtimeUrl).toBe(`https://vcenter.test.local${VIM}/HostSystem/host-17/runtime`);
      expect(runtime.headers).toMatchObject({ 'vmware-api-session-id': 'vim-token' });
      expect(fetchFn).toHaveBeenCalledTimes(5);
    });

    it('returns undefined when no host has that name', async () => {
      const fetchFn = routedFetch({ ...DEFAULT_ROUTES, '/api/vcenter/host': () => json([]) });
      const host = await createVcenterClient(CONNECTION, fetchFn).findHost('esx99.test.local');
      expect(host).toBeUndefined();
      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it('reports maintenance mode from the host runtime', async () => {
      const fetchFn = routedFetch({
        ...DEFAULT_ROUTES,
        [`${VIM}/HostSystem/host-17/runtime`]: () => json({ inMaintenanceMode: true }),
      });
      const host = await createVcenterClient(CONNECTION, fetchFn).findHost('esx01.test.local');
      expect(host?.inMaintenanceMode).toBe(true);
    });

    it('throws when session auth is rejected', async () => {
      const fetchFn = routedFetch({
        ...DEFAULT_ROUTES,
        '/api/session': () => new Response('denied', { status: 401, statusText: 'Unauthorized' }),
      });
      await expect(
        createVcenterClient(CONNECTION, fetchFn).findHost('esx01.test.local'),
      ).rejects.toThrow('vCenter session auth returned 401: Unauthorized');
    });

    it('throws when the VI/JSON login returns no session header', async () => {
      const fetchFn = routedFetch({
        ...DEFAULT_ROUTES,
        [`${VIM}/SessionManager/SessionManager/Login`]: () => json({}),
      });
      await expect(
        createVcenterClient(CONNECTION, fetchFn).findHost('esx01.test.local'),
      ).rejects.toThrow('no vmware-api-session-id header');
    });
  });

  describe('getStorageDeviceInfo', () => {
    it('reads and normalizes the storage snapshot', async () => {
      const fetchFn = routedFetch(DEFAULT_ROUTES);
      const client = createVcenterClient(CONNECTION, fetchFn);

      const info = await client.getStorageDeviceInfo({
        name: 'esx01.test.local',
        id: 'host-17',
        inMaintenanceMode: false,
        storageSystem: 'storageSystem-17',
      });
      expect(info).toEqual({
        hostBusAdapters: [
          { key: 'key-vim.host.BlockHba-vmhba0', device: 'vmhba0', model: 'SATA AHCI', status: 'online' },
        ],
        scsiLuns: [],
        scsiTopology: [],
      });
    });

    it('throws on a non-2xx property read', async () => {
      const fetchFn = routedFetch(DEFAULT_ROUTES);
      const client = createVcenterClient(CONNECTION, fetchFn);
      await expect(
        client.getStorageDeviceInfo({
          name: 'esx02.test.local',
          id: 'host-18',
          inMaintenanceMode: false,
          storageSystem: 'storageSystem-18',
        }),
      ).rejects.toThrow('vCenter VI/JSON API returned 404: Not Found');
    });
  });
});
