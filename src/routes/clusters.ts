import { Hono } from 'hono';
import { ApiClusterList } from '../model/cluster.js';
import { ApiError } from '../errors.js';
import type { InventoryStore } from '../services/inventory-store.js';
import { respondWithList } from '../utils/content-negotiation.js';
import { requirePathParam } from '../validation.js';

/**
 * Cluster routes.
 *
 * - GET /              - every cluster, as a `clusterList` envelope (JSON or XML)
 * - GET /:clusterName  - one cluster
 */
export function createClusterRoutes(store: InventoryStore): Hono {
  const app = new Hono();

  app.get('/', async (c) => {
    return respondWithList(c, new ApiClusterList(await store.listClusters()));
  });

  app.get('/:clusterName', async (c) => {
    const name = requirePathParam(c, 'clusterName');
    const cluster = await store.getCluster(name);
    if (!cluster) {
      throw ApiError.notFound(`Cluster ${name} not found`);
    }
    return c.json(cluster);
  });

  return app;
}
