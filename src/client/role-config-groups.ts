import { encodeListJson, encodeRecordJson } from '../codec/json-codec.js';
import { ApiConfigList } from '../model/config.js';
import {
  API_ROLE_CONFIG_GROUP_FIELDS,
  ApiRoleConfigGroupList,
  ApiRoleConfigGroupSchema,
  type ApiRoleConfigGroup,
} from '../model/role-config-group.js';
import { ApiRoleList, ApiRoleNameList } from '../model/role.js';
import type { ClusterManagerClient } from './api-client.js';
import { parseListResponse, parseRecordResponse } from './decode.js';

/**
 * Role config group endpoints. Every function takes the service it
 * addresses; omit `clusterName` to address the management service.
 */
export interface ServiceTarget {
  serviceName: string;
  clusterName?: string;
}

export function roleConfigGroupsPath({ clusterName, serviceName }: ServiceTarget): string {
  if (!clusterName) {
    return 'cm/service/roleConfigGroups';
  }
  return `clusters/${encodeURIComponent(clusterName)}/services/${encodeURIComponent(serviceName)}/roleConfigGroups`;
}

function groupPath(target: ServiceTarget, name: string): string {
  return `${roleConfigGroupsPath(target)}/${encodeURIComponent(name)}`;
}

function decodeGroup(body: unknown): ApiRoleConfigGroup {
  return parseRecordResponse(body, API_ROLE_CONFIG_GROUP_FIELDS, ApiRoleConfigGroupSchema);
}

export async function createRoleConfigGroups(
  client: ClusterManagerClient,
  target: ServiceTarget,
  groups: ApiRoleConfigGroupList,
): Promise<ApiRoleConfigGroupList> {
  const body = await client.post(roleConfigGroupsPath(target), encodeListJson(groups));
  return parseListResponse(body, ApiRoleConfigGroupList.SCHEMA);
}

/** Create one group and return it. */
export async function createRoleConfigGroup(
  client: ClusterManagerClient,
  target: ServiceTarget,
  group: { name: string; displayName?: string; roleType: string },
): Promise<ApiRoleConfigGroup> {
  const created = await createRoleConfigGroups(client, target, new ApiRoleConfigGroupList([group]));
  const first = created.get(0);
  if (!first) {
    throw new Error(`Server created no role config group for ${group.name}`);
  }
  return first;
}

export async function getRoleConfigGroup(
  client: ClusterManagerClient,
  target: ServiceTarget,
  name: string,
): Promise<ApiRoleConfigGroup> {
  return decodeGroup(await client.get(groupPath(target, name)));
}

export async function getAllRoleConfigGroups(
  client: ClusterManagerClient,
  target: ServiceTarget,
): Promise<ApiRoleConfigGroupList> {
  return parseListResponse(await client.get(roleConfigGroupsPath(target)), ApiRoleConfigGroupList.SCHEMA);
}

export async function updateRoleConfigGroup(
  client: ClusterManagerClient,
  target: ServiceTarget,
  name: string,
  group: ApiRoleConfigGroup,
): Promise<ApiRoleConfigGroup> {
  const body = await client.put(
    groupPath(target, name),
    encodeRecordJson(group, API_ROLE_CONFIG_GROUP_FIELDS),
  );
  return decodeGroup(body);
}

/** Delete a group. @returns The deleted group. */
export async function deleteRoleConfigGroup(
  client: ClusterManagerClient,
  target: ServiceTarget,
  name: string,
): Promise<ApiRoleConfigGroup> {
  return decodeGroup(await client.delete(groupPath(target, name)));
}

export async function getRoleConfigGroupConfig(
  client: ClusterManagerClient,
  target: ServiceTarget,
  name: string,
): Promise<ApiConfigList> {
  return parseListResponse(await client.get(`${groupPath(target, name)}/config`), ApiConfigList.SCHEMA);
}

export async function updateRoleConfigGroupConfig(
  client: ClusterManagerClient,
  target: ServiceTarget,
  name: string,
  config: ApiConfigList,
): Promise<ApiConfigList> {
  const body = await client.put(`${groupPath(target, name)}/config`, encodeListJson(config));
  return parseListResponse(body, ApiConfigList.SCHEMA);
}

export async function getRoleConfigGroupRoles(
  client: ClusterManagerClient,
  target: ServiceTarget,
  name: string,
): Promise<ApiRoleList> {
  return parseListResponse(await client.get(`${groupPath(target, name)}/roles`), ApiRoleList.SCHEMA);
}

/**
 * Move roles into the named group. Roles may come from any group of the
 * same service, but must share the destination's role type.
 * @returns The roles that were moved.
 */
export async function moveRoles(
  client: ClusterManagerClient,
  target: ServiceTarget,
  name: string,
  roleNames: string[],
): Promise<ApiRoleList> {
  const body = await client.put(
    `${groupPath(target, name)}/roles`,
    encodeListJson(new ApiRoleNameList(roleNames)),
  );
  return parseListResponse(body, ApiRoleList.SCHEMA);
}

/** Move each role back to the base group of its role type. */
export async function moveRolesToBaseRoleConfigGroup(
  client: ClusterManagerClient,
  target: ServiceTarget,
  roleNames: string[],
): Promise<ApiRoleList> {
  const body = await client.put(
    `${roleConfigGroupsPath(target)}/roles`,
    encodeListJson(new ApiRoleNameList(roleNames)),
  );
  return parseListResponse(body, ApiRoleList.SCHEMA);
}
