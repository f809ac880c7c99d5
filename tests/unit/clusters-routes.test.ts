import { describe, it, expect } from 'vitest';
import { createTestApp } from '../fixtures/app.js';
import { InMemoryInventoryStore } from '../../src/services/inventory-store.js';

describe('cluster routes', () => {
  it('GET /clusters lists clusters in a JSON envelope', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/v14/clusters');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      items: [
        { name: 'cluster1', displayName: 'Cluster 1', version: 'CDH7', fullVersion: '7.1.7', maintenanceMode: false },
        { name: 'cluster2', displayName: 'Cluster 2', version: 'CDH7', maintenanceMode: true },
      ],
    });
  });

  it('GET /clusters answers XML when asked', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/v12/clusters', {
      headers: { Accept: 'application/xml, application/json;q=0.5' },
    });
    const xml = await res.text();
    expect(xml).toContain('<clusterList><items><cluster><name>cluster1</name>');
    expect(xml).toContain('<maintenanceMode>true</maintenanceMode></cluster></items></clusterList>');
  });

  it('GET /clusters with no clusters returns an empty envelope', async () => {
    const { app } = createTestApp({ store: new InMemoryInventoryStore() });
    expect(await (await app.request('/api/v14/clusters')).json()).toEqual({ items: [] });

    const xml = await (
      await app.request('/api/v14/clusters', { headers: { Accept: 'text/xml' } })
    ).text();
    expect(xml.endsWith('<clusterList><items></items></clusterList>')).toBe(true);
  });

  it('GET /clusters/:clusterName returns one cluster', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/v14/clusters/cluster2');
    expect(await res.json()).toEqual({
      name: 'cluster2',
      displayName: 'Cluster 2',
      version: 'CDH7',
      maintenanceMode: true,
    });
  });

  it('returns 404 for an unknown cluster', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/v14/clusters/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: 'not_found', message: 'Cluster nope not found' });
  });

  it('rejects an invalid cluster name', async () => {
    const { app } = createTestApp();
    const res = await app.request('/api/v14/clusters/bad%20name');
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'invalid_request', message: 'Invalid clusterName format' });
  });
});
