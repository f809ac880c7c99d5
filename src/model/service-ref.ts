import { z } from 'zod';
import { field, record } from '../codec/wire-schema.js';

/**
 * Reference to a service. Services of the management role carry no
 * cluster name.
 */
export const ApiServiceRefSchema = z.object({
  clusterName: z.string().min(1).optional(),
  serviceName: z.string().min(1),
});

export type ApiServiceRef = z.infer<typeof ApiServiceRefSchema>;

export const API_SERVICE_REF_FIELDS = record(
  field('clusterName', 'string'),
  field('serviceName', 'string'),
);

/** Name of the management service addressed by `/cm/service`. */
export const MANAGEMENT_SERVICE_NAME = 'mgmt';

export function managementServiceRef(): ApiServiceRef {
  return { serviceName: MANAGEMENT_SERVICE_NAME };
}

export function formatServiceRef(ref: ApiServiceRef): string {
  return ref.clusterName ? `${ref.clusterName}/${ref.serviceName}` : `cm/${ref.serviceName}`;
}
