import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { ClusterManagerClient } from '../../src/client/api-client.js';
import { getScmDbInfo, getVersion, managerResource, updateConfig } from '../../src/client/manager.js';
import { getCluster, listClusters } from '../../src/client/clusters.js';
import {
  createRoleConfigGroup,
  deleteRoleConfigGroup,
  getAllRoleConfigGroups,
  getRoleConfigGroupConfig,
  getRoleConfigGroupRoles,
  moveRoles,
  moveRolesToBaseRoleConfigGroup,
  roleConfigGroupsPath,
  updateRoleConfigGroup,
  updateRoleConfigGroupConfig,
} from '../../src/client/role-config-groups.js';
import { ApiError } from '../../src/errors.js';
import { ApiConfigList } from '../../src/model/config.js';
import { createTestApp } from '../fixtures/app.js';
import { createMockPool } from '../fixtures/pg-test.js';

const BASE = 'http://cm.test:7180/api/v14';
const HDFS = { clusterName: 'cluster1', serviceName: 'hdfs1' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Route the client's fetch calls into an in-process app. */
function connectToApp(app: Hono) {
  return vi
    .spyOn(globalThis, 'fetch')
    .mockImplementation(async (input, init) => app.request(input, init));
}

describe('ClusterManagerClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds URLs under the versioned base and sends JSON', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () =>
      jsonResponse({ version: '1.0.0', apiVersions: ['v14'], snapshot: false }),
    );
    const client = new ClusterManagerClient(`${BASE}/`, { headers: { Authorization: 'Basic dGVzdDp0ZXN0' } });

    expect(await getVersion(client)).toEqual({ version: '1.0.0', apiVersions: ['v14'], snapshot: false });
    expect(fetchSpy).toHaveBeenCalledWith(
      `${BASE}/cm/version`,
      expect.objectContaining({
        method: 'GET',
        headers: { Accept: 'application/json', Authorization: 'Basic dGVzdDp0ZXN0' },
      }),
    );
  });

  it('appends query parameters that are set', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () => jsonResponse({}));
    const client = new ClusterManagerClient(BASE);
    await client.get('clusters', { query: { view: 'summary', skipped: undefined } });
    expect(fetchSpy.mock.calls[0]?.[0]).toBe(`${BASE}/clusters?view=summary`);
  });

  it('rejects non-2xx responses with the server error body', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(async () =>
      jsonResponse({ error: 'not_found', message: 'Cluster x not found' }, 404),
    );
    const client = new ClusterManagerClient(BASE);
    await expect(getCluster(client, 'x')).rejects.toMatchObject({
      status: 404,
      body: { error: 'not_found', message: 'Cluster x not found' },
    });
    expect(client.circuit).toBe('closed');
  });

  it('falls back to the status line for non-JSON errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(async () => new Response('', { status: 502 }));
    const client = new ClusterManagerClient(BASE);
    await expect(client.get('cm/version')).rejects.toMatchObject({
      status: 502,
      body: { error: 'http_error', message: 'HTTP 502' },
    });
  });

  it('reports transport failures as 503', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const client = new ClusterManagerClient(BASE);
    await expect(client.get('cm/version')).rejects.toMatchObject({
      status: 503,
      body: { error: 'upstream_unreachable', message: `GET ${BASE}/cm/version failed: fetch failed` },
    });
  });

  it('reports a response of the wrong shape as 502', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(async () => jsonResponse({ scmDbType: 'DB2' }));
    const client = new ClusterManagerClient(BASE);
    await expect(getScmDbInfo(client)).rejects.toMatchObject({
      status: 502,
      body: { error: 'invalid_response' },
    });
  });

  it.each([
    ['items that are not an array', { items: 'bad' }, 'Unexpected response shape: "items" must be an array'],
    ['an element missing its name', { items: [{ displayName: 'x' }] }, 'Unexpected response shape: items[0].name: Required'],
    ['a body that is not an object', ['c1'], 'Unexpected response shape: expected an object with an "items" array'],
  ])('reports a cluster list with %s as 502', async (_label, body, message) => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(async () => jsonResponse(body));
    const client = new ClusterManagerClient(BASE);
    const failure = listClusters(client);
    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({
      status: 502,
      body: { error: 'invalid_response', message },
    });
  });

  it('reports a malformed group record as 502', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(async () => jsonResponse({ name: 'g1' }));
    const client = new ClusterManagerClient(BASE);
    await expect(
      updateRoleConfigGroup(client, HDFS, 'g1', { name: 'g1', roleType: 'DATANODE' }),
    ).rejects.toMatchObject({ status: 502, body: { error: 'invalid_response' } });
  });

  it('opens the circuit after repeated server errors and probes after the cooldown', async () => {
    vi.useFakeTimers();
    try {
      const fetchSpy = vi
        .spyOn(globalThis, 'fetch')
        .mockImplementation(async () => jsonResponse({ error: 'internal_error', message: 'boom' }, 500));
      const log = vi.fn();
      const client = new ClusterManagerClient(BASE, { maxFailures: 2, cooldownMs: 1_000, log });

      await expect(client.get('cm/version')).rejects.toBeInstanceOf(ApiError);
      expect(client.circuit).toBe('closed');
      await expect(client.get('cm/version')).rejects.toBeInstanceOf(ApiError);
      expect(client.circuit).toBe('open');

      await expect(client.get('cm/version')).rejects.toMatchObject({
        status: 503,
        body: { error: 'circuit_open' },
      });
      expect(fetchSpy).toHaveBeenCalledTimes(2);
      expect(log).toHaveBeenCalledWith('error', expect.objectContaining({
        event: 'circuit_breaker_transition',
        from: 'closed',
        to: 'open',
      }));

      vi.advanceTimersByTime(1_000);
      fetchSpy.mockImplementation(async () =>
        jsonResponse({ version: '1.0.0', apiVersions: ['v14'], snapshot: false }),
      );
      await getVersion(client);
      expect(client.circuit).toBe('closed');
    } finally {
      vi.useRealTimers();
    }
  });

  it('re-opens the circuit when the half-open probe fails', async () => {
    vi.useFakeTimers();
    try {
      vi.spyOn(globalThis, 'fetch').mockImplementation(async () => new Response('', { status: 503 }));
      const client = new ClusterManagerClient(BASE, { maxFailures: 1, cooldownMs: 500 });

      await expect(client.get('cm/version')).rejects.toMatchObject({ status: 503 });
      expect(client.circuit).toBe('open');
      vi.advanceTimersByTime(500);
      await expect(client.get('cm/version')).rejects.toMatchObject({ status: 503 });
      expect(client.circuit).toBe('open');
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('client against the in-process server', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('addresses the management service when no cluster is given', () => {
    expect(roleConfigGroupsPath({ serviceName: 'mgmt' })).toBe('cm/service/roleConfigGroups');
    expect(roleConfigGroupsPath(HDFS)).toBe('clusters/cluster1/services/hdfs1/roleConfigGroups');
  });

  it('reads clusters and the manager database', async () => {
    const pool = createMockPool();
    pool._setResponse('SELECT version()', { rows: [{ version: 'PostgreSQL 14.5' }], rowCount: 1 });
    const { app } = createTestApp({ dbPool: pool }, { DATABASE_URL: 'postgresql://db.internal:5432/scm' });
    connectToApp(app);
    const client = new ClusterManagerClient(BASE);

    const clusters = await listClusters(client);
    expect(clusters.getClusters().map((c) => c.name)).toEqual(['cluster1', 'cluster2']);
    expect(await getScmDbInfo(client)).toEqual({
      scmDbType: 'POSTGRESQL',
      scmDbHost: 'db.internal',
      scmDbPort: 5432,
      scmDbName: 'scm',
      embeddedDbUsed: false,
    });
  });

  it('surfaces a 404 for scmDbInfo on v12', async () => {
    const { app } = createTestApp();
    connectToApp(app);
    const client = new ClusterManagerClient('http://cm.test:7180/api/v12');
    await expect(getScmDbInfo(client)).rejects.toMatchObject({ status: 404 });
  });

  it('drives the role config group lifecycle', async () => {
    const { app } = createTestApp();
    connectToApp(app);
    const client = new ClusterManagerClient(BASE);

    const created = await createRoleConfigGroup(client, HDFS, { name: 'dn-ssd', roleType: 'DATANODE' });
    expect(created).toEqual({
      name: 'dn-ssd',
      displayName: 'dn-ssd',
      roleType: 'DATANODE',
      base: false,
      serviceRef: HDFS,
      config: [],
    });

    const updated = await updateRoleConfigGroup(client, HDFS, 'dn-ssd', {
      ...created,
      displayName: 'SSD DataNodes',
    });
    expect(updated.displayName).toBe('SSD DataNodes');

    const config = await updateRoleConfigGroupConfig(
      client,
      HDFS,
      'dn-ssd',
      new ApiConfigList([{ name: 'dfs_data_dir_list', value: '/ssd/1' }]),
    );
    expect(config.items).toEqual([{ name: 'dfs_data_dir_list', value: '/ssd/1' }]);
    expect((await getRoleConfigGroupConfig(client, HDFS, 'dn-ssd')).items).toEqual(config.items);

    const moved = await moveRoles(client, HDFS, 'dn-ssd', ['hdfs1-DATANODE-1']);
    expect(moved.getRoles()[0]?.roleConfigGroupRef).toEqual({ roleConfigGroupName: 'dn-ssd' });
    expect((await getRoleConfigGroupRoles(client, HDFS, 'dn-ssd')).size).toBe(1);

    await moveRolesToBaseRoleConfigGroup(client, HDFS, ['hdfs1-DATANODE-1']);
    const deleted = await deleteRoleConfigGroup(client, HDFS, 'dn-ssd');
    expect(deleted.name).toBe('dn-ssd');
    expect((await getAllRoleConfigGroups(client, HDFS)).getGroups().map((g) => g.name)).toEqual([
      'hdfs1-DATANODE-BASE',
      'hdfs1-NAMENODE-BASE',
    ]);
  });

  it('exposes the manager resource through the versioned contract', async () => {
    const { app } = createTestApp();
    connectToApp(app);
    const resource = managerResource(new ClusterManagerClient(BASE));

    await updateConfig(new ClusterManagerClient(BASE), new ApiConfigList([{ name: 'SECURITY_REALM' }]));
    expect(await resource.getKerberosInfo()).toEqual({ kerberized: false, kdcHost: 'kdc.example.com' });
    expect((await resource.getConfig()).toMap()).toEqual(new Map([['KDC_HOST', 'kdc.example.com']]));
  });
});
