import { encodeListJson } from '../codec/json-codec.js';
import { ApiConfigList } from '../model/config.js';
import {
  ApiKerberosInfoSchema,
  ApiScmDbInfoSchema,
  ApiVersionInfoSchema,
  type ApiKerberosInfo,
  type ApiScmDbInfo,
  type ApiVersionInfo,
} from '../model/manager.js';
import type { ClusterManagerResourceV14 } from '../resources/cluster-manager-resource.js';
import { parseListResponse, parseResponse } from './decode.js';
import type { ClusterManagerClient } from './api-client.js';

const CM_PATH = 'cm';

/** The manager server's database connection information (API v14+). */
export async function getScmDbInfo(client: ClusterManagerClient): Promise<ApiScmDbInfo> {
  return parseResponse(ApiScmDbInfoSchema, await client.get(`${CM_PATH}/scmDbInfo`));
}

export async function getVersion(client: ClusterManagerClient): Promise<ApiVersionInfo> {
  return parseResponse(ApiVersionInfoSchema, await client.get(`${CM_PATH}/version`));
}

export async function getKerberosInfo(client: ClusterManagerClient): Promise<ApiKerberosInfo> {
  return parseResponse(ApiKerberosInfoSchema, await client.get(`${CM_PATH}/kerberosInfo`));
}

export async function getConfig(client: ClusterManagerClient): Promise<ApiConfigList> {
  return parseListResponse(await client.get(`${CM_PATH}/config`), ApiConfigList.SCHEMA);
}

/**
 * Update manager configuration. Entries without a value reset the key.
 * @returns The full configuration after the update.
 */
export async function updateConfig(
  client: ClusterManagerClient,
  config: ApiConfigList,
): Promise<ApiConfigList> {
  return parseListResponse(
    await client.put(`${CM_PATH}/config`, encodeListJson(config)),
    ApiConfigList.SCHEMA,
  );
}

/**
 * The manager resource as seen from a client: every v14 operation bound
 * to one ClusterManagerClient.
 */
export function managerResource(client: ClusterManagerClient): ClusterManagerResourceV14 {
  return {
    getVersion: () => getVersion(client),
    getConfig: () => getConfig(client),
    updateConfig: (config) => updateConfig(client, config),
    getKerberosInfo: () => getKerberosInfo(client),
    getScmDbInfo: () => getScmDbInfo(client),
  };
}
