import { z } from 'zod';
import { ApiListBase } from './list-base.js';
import { field, record, type ListSchema } from '../codec/wire-schema.js';

export const ENTITY_STATUSES = [
  'UNKNOWN',
  'NONE',
  'STOPPED',
  'DOWN',
  'UNKNOWN_HEALTH',
  'DISABLED_HEALTH',
  'CONCERNING_HEALTH',
  'BAD_HEALTH',
  'GOOD_HEALTH',
  'STARTING',
  'STOPPING',
] as const;

export const ApiClusterSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  version: z.string().optional(),
  fullVersion: z.string().optional(),
  maintenanceMode: z.boolean().optional(),
  entityStatus: z.enum(ENTITY_STATUSES).optional(),
  uuid: z.string().optional(),
});

export type ApiCluster = z.infer<typeof ApiClusterSchema>;

export const API_CLUSTER_FIELDS = record(
  field('name', 'string'),
  field('displayName', 'string'),
  field('version', 'string'),
  field('fullVersion', 'string'),
  field('maintenanceMode', 'boolean'),
  field('entityStatus', 'string'),
  field('uuid', 'string'),
);

/** A list of clusters. */
export class ApiClusterList extends ApiListBase<ApiCluster> {
  static readonly SCHEMA: ListSchema<ApiCluster, ApiClusterList> = {
    xmlRoot: 'clusterList',
    xmlElement: 'cluster',
    itemType: API_CLUSTER_FIELDS,
    item: ApiClusterSchema,
    create: (values) => new ApiClusterList(values),
  };

  get schema(): ListSchema<ApiCluster, ApiClusterList> {
    return ApiClusterList.SCHEMA;
  }

  getClusters(): readonly ApiCluster[] {
    return this.values;
  }
}
