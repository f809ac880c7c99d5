import type { ApiConfigList } from '../model/config.js';
import type { ApiKerberosInfo, ApiScmDbInfo, ApiVersionInfo } from '../model/manager.js';

/**
 * Versioned contracts of the manager resource (`/api/v{N}/cm`).
 *
 * Each version extends exactly one predecessor and only adds operations,
 * so the capability set of a later version is a superset of every earlier
 * one. The operation tables mirror the interfaces as data: routes are
 * mounted from them and the compliance tests enumerate them.
 */

export interface ClusterManagerResourceV1 {
  /** Server version and the API versions it serves. */
  getVersion(): Promise<ApiVersionInfo>;
  /** Manager-wide configuration. */
  getConfig(): Promise<ApiConfigList>;
  /** Merge configuration values; an unset value removes the key. */
  updateConfig(config: ApiConfigList): Promise<ApiConfigList>;
}

export interface ClusterManagerResourceV12 extends ClusterManagerResourceV1 {
  /** Kerberos settings of the managed deployment. */
  getKerberosInfo(): Promise<ApiKerberosInfo>;
}

export interface ClusterManagerResourceV14 extends ClusterManagerResourceV12 {
  /**
   * Connection information of the manager server's own database.
   * Rejects with a 503 ApiError when the database cannot be reached.
   */
  getScmDbInfo(): Promise<ApiScmDbInfo>;
}

export type HttpMethod = 'GET' | 'PUT';

export interface OperationDescriptor<Name extends string = string> {
  readonly name: Name;
  readonly method: HttpMethod;
  /** Path relative to the versioned `cm` base. */
  readonly path: string;
}

export const MANAGER_OPERATIONS_V1 = [
  { name: 'getVersion', method: 'GET', path: 'version' },
  { name: 'getConfig', method: 'GET', path: 'config' },
  { name: 'updateConfig', method: 'PUT', path: 'config' },
] as const satisfies readonly OperationDescriptor<keyof ClusterManagerResourceV1>[];

export const MANAGER_OPERATIONS_V12 = [
  ...MANAGER_OPERATIONS_V1,
  { name: 'getKerberosInfo', method: 'GET', path: 'kerberosInfo' },
] as const satisfies readonly OperationDescriptor<keyof ClusterManagerResourceV12>[];

export const MANAGER_OPERATIONS_V14 = [
  ...MANAGER_OPERATIONS_V12,
  { name: 'getScmDbInfo', method: 'GET', path: 'scmDbInfo' },
] as const satisfies readonly OperationDescriptor<keyof ClusterManagerResourceV14>[];

/** API versions this server mounts, oldest first. */
export const SUPPORTED_API_VERSIONS = ['v12', 'v14'] as const;
export type ApiVersion = (typeof SUPPORTED_API_VERSIONS)[number];

/** Manager resource capability set per mounted API version. */
export const MANAGER_OPERATIONS: Record<ApiVersion, readonly OperationDescriptor<keyof ClusterManagerResourceV14>[]> = {
  v12: MANAGER_OPERATIONS_V12,
  v14: MANAGER_OPERATIONS_V14,
};
