export { ClusterManagerClient } from './api-client.js';
export type { ClusterManagerClientOptions, RequestOptions } from './api-client.js';
export * from './manager.js';
export * from './clusters.js';
export * from './role-config-groups.js';
