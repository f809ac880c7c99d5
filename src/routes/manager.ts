import { Hono, type Context } from 'hono';
import { ApiConfigList } from '../model/config.js';
import type {
  ClusterManagerResourceV14,
  OperationDescriptor,
} from '../resources/cluster-manager-resource.js';
import { readListBody, respondWithList } from '../utils/content-negotiation.js';

type OperationHandler = (resource: ClusterManagerResourceV14, c: Context) => Promise<Response>;

/** One HTTP binding per manager operation, across every API version. */
const OPERATION_HANDLERS: Record<keyof ClusterManagerResourceV14, OperationHandler> = {
  getVersion: async (resource, c) => c.json(await resource.getVersion()),
  getConfig: async (resource, c) => respondWithList(c, await resource.getConfig()),
  updateConfig: async (resource, c) => {
    const update = await readListBody(c, ApiConfigList.SCHEMA);
    return respondWithList(c, await resource.updateConfig(update));
  },
  getKerberosInfo: async (resource, c) => c.json(await resource.getKerberosInfo()),
  getScmDbInfo: async (resource, c) => c.json(await resource.getScmDbInfo()),
};

/**
 * Manager resource routes (`/cm`) for one API version.
 *
 * Only the operations in `operations` are mounted, so an older API
 * version answers 404 for anything added after it.
 *
 * Endpoints (v14):
 * - GET /version
 * - GET /config, PUT /config
 * - GET /kerberosInfo
 * - GET /scmDbInfo
 */
export function createManagerRoutes(
  resource: ClusterManagerResourceV14,
  operations: readonly OperationDescriptor<keyof ClusterManagerResourceV14>[],
): Hono {
  const app = new Hono();
  for (const operation of operations) {
    const handler = OPERATION_HANDLERS[operation.name];
    app.on(operation.method, `/${operation.path}`, (c) => handler(resource, c));
  }
  return app;
}
