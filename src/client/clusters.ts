import { ApiClusterList, ApiClusterSchema, type ApiCluster } from '../model/cluster.js';
import { parseListResponse, parseResponse } from './decode.js';
import type { ClusterManagerClient } from './api-client.js';

export async function listClusters(client: ClusterManagerClient): Promise<ApiClusterList> {
  return parseListResponse(await client.get('clusters'), ApiClusterList.SCHEMA);
}

export async function getCluster(client: ClusterManagerClient, name: string): Promise<ApiCluster> {
  return parseResponse(ApiClusterSchema, await client.get(`clusters/${encodeURIComponent(name)}`));
}
