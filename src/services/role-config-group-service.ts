import { ApiError } from '../errors.js';
import { ApiConfigList } from '../model/config.js';
import { ApiRoleConfigGroupList, type ApiRoleConfigGroup } from '../model/role-config-group.js';
import { ApiRoleList, type ApiRole } from '../model/role.js';
import { formatServiceRef, type ApiServiceRef } from '../model/service-ref.js';
import { groupExistsError, type InventoryStore, type RoleAssignment } from './inventory-store.js';
import type { LogCallback } from '../middleware/logger.js';

/**
 * Role config group operations for one service, cluster-scoped or the
 * management service.
 *
 * Rules:
 * - group names are unique within a service
 * - `roleType` never changes after creation
 * - base groups cannot be deleted; neither can groups that still hold roles
 * - a role moves only into a group of its own role type
 */
export class RoleConfigGroupService {
  constructor(
    private readonly store: InventoryStore,
    private readonly log: LogCallback | null = null,
  ) {}

  async readGroups(ref: ApiServiceRef): Promise<ApiRoleConfigGroupList> {
    await this.requireService(ref);
    return new ApiRoleConfigGroupList(await this.store.listGroups(ref));
  }

  async readGroup(ref: ApiServiceRef, name: string): Promise<ApiRoleConfigGroup> {
    await this.requireService(ref);
    return this.requireGroup(ref, name);
  }

  async createGroups(
    ref: ApiServiceRef,
    requested: ApiRoleConfigGroupList,
  ): Promise<ApiRoleConfigGroupList> {
    await this.requireService(ref);
    const existing = new Set((await this.store.listGroups(ref)).map((g) => g.name));

    const created: ApiRoleConfigGroup[] = [];
    for (const group of requested) {
      if (existing.has(group.name)) {
        throw groupExistsError(ref, group.name);
      }
      existing.add(group.name);
      created.push({
        name: group.name,
        displayName: group.displayName ?? group.name,
        roleType: group.roleType,
        base: false,
        serviceRef: ref,
        config: group.config ?? [],
      });
    }

    // The store checks names again, atomically
    await this.store.insertGroups(ref, created);
    this.log?.('info', {
      event: 'role_config_groups_created',
      service: formatServiceRef(ref),
      groups: created.map((g) => g.name),
    });
    return new ApiRoleConfigGroupList(created);
  }

  async updateGroup(
    ref: ApiServiceRef,
    name: string,
    update: ApiRoleConfigGroup,
  ): Promise<ApiRoleConfigGroup> {
    await this.requireService(ref);
    const current = await this.requireGroup(ref, name);

    if (update.roleType !== current.roleType) {
      throw ApiError.invalidRequest(
        `Role type of ${name} cannot change (${current.roleType} → ${update.roleType})`,
      );
    }
    if (update.name !== name && (await this.store.getGroup(ref, update.name))) {
      throw groupExistsError(ref, update.name);
    }

    const next: ApiRoleConfigGroup = {
      ...current,
      name: update.name,
      displayName: update.displayName ?? current.displayName,
      config: update.config ?? current.config,
    };
    await this.store.replaceGroup(ref, name, next);
    return next;
  }

  async deleteGroup(ref: ApiServiceRef, name: string): Promise<ApiRoleConfigGroup> {
    await this.requireService(ref);
    const group = await this.requireGroup(ref, name);
    if (group.base) {
      throw ApiError.invalidRequest(`Base role config group ${name} cannot be deleted`);
    }
    const members = (await this.store.listRoles(ref)).filter((r) => memberOf(r, name));
    if (members.length > 0) {
      throw ApiError.conflict(
        `Role config group ${name} still contains ${members.length} role(s)`,
      );
    }

    await this.store.deleteGroup(ref, name);
    this.log?.('info', {
      event: 'role_config_group_deleted',
      service: formatServiceRef(ref),
      group: name,
    });
    return group;
  }

  async readConfig(ref: ApiServiceRef, name: string): Promise<ApiConfigList> {
    const group = await this.readGroup(ref, name);
    return new ApiConfigList(group.config ?? []);
  }

  async updateConfig(
    ref: ApiServiceRef,
    name: string,
    update: ApiConfigList,
  ): Promise<ApiConfigList> {
    const group = await this.readGroup(ref, name);
    const merged = mergeConfig(new ApiConfigList(group.config ?? []).toMap(), update);
    const config = ApiConfigList.fromMap(merged);
    await this.store.replaceGroup(ref, name, { ...group, config: [...config.items] });
    return config;
  }

  async readRoles(ref: ApiServiceRef, name: string): Promise<ApiRoleList> {
    await this.readGroup(ref, name);
    const roles = await this.store.listRoles(ref);
    return new ApiRoleList(roles.filter((r) => memberOf(r, name)));
  }

  /** Move roles into `name`. Every role must match the group's role type. */
  async moveRoles(ref: ApiServiceRef, name: string, roleNames: readonly string[]): Promise<ApiRoleList> {
    const group = await this.readGroup(ref, name);
    const roles = await this.resolveRoles(ref, roleNames);

    const mismatched = roles.find((r) => r.type !== group.roleType);
    if (mismatched) {
      throw ApiError.invalidRequest(
        `Role ${mismatched.name} has type ${mismatched.type}; group ${name} holds ${group.roleType}`,
      );
    }

    return this.assign(ref, roles, () => name);
  }

  /** Move each role into the base group of its role type. */
  async moveRolesToBaseGroup(ref: ApiServiceRef, roleNames: readonly string[]): Promise<ApiRoleList> {
    await this.requireService(ref);
    const roles = await this.resolveRoles(ref, roleNames);

    const baseByType = new Map<string, string>();
    for (const group of await this.store.listGroups(ref)) {
      if (group.base) baseByType.set(group.roleType, group.name);
    }
    const orphan = roles.find((r) => !baseByType.has(r.type));
    if (orphan) {
      throw ApiError.invalidRequest(
        `No base role config group for role type ${orphan.type} in ${formatServiceRef(ref)}`,
      );
    }

    return this.assign(ref, roles, (role) => baseByType.get(role.type) ?? '');
  }

  private async assign(
    ref: ApiServiceRef,
    roles: ApiRole[],
    target: (role: ApiRole) => string,
  ): Promise<ApiRoleList> {
    const assignments: RoleAssignment[] = roles.map((role) => ({
      roleName: role.name,
      groupName: target(role),
    }));
    await this.store.assignRoles(ref, assignments);
    this.log?.('info', {
      event: 'roles_moved',
      service: formatServiceRef(ref),
      moves: assignments,
    });
    return new ApiRoleList(
      roles.map((role) => ({
        ...role,
        roleConfigGroupRef: { roleConfigGroupName: target(role) },
      })),
    );
  }

  private async resolveRoles(ref: ApiServiceRef, roleNames: readonly string[]): Promise<ApiRole[]> {
    const byName = new Map((await this.store.listRoles(ref)).map((r) => [r.name, r]));
    return roleNames.map((roleName) => {
      const role = byName.get(roleName);
      if (!role) {
        throw ApiError.notFound(`Role ${roleName} not found in ${formatServiceRef(ref)}`);
      }
      return role;
    });
  }

  private async requireService(ref: ApiServiceRef): Promise<void> {
    const service = await this.store.getService(ref);
    if (!service) {
      throw ApiError.notFound(`Service ${formatServiceRef(ref)} not found`);
    }
  }

  private async requireGroup(ref: ApiServiceRef, name: string): Promise<ApiRoleConfigGroup> {
    const group = await this.store.getGroup(ref, name);
    if (!group) {
      throw ApiError.notFound(`Role config group ${name} not found in ${formatServiceRef(ref)}`);
    }
    return group;
  }
}

function memberOf(role: ApiRole, groupName: string): boolean {
  return role.roleConfigGroupRef?.roleConfigGroupName === groupName;
}

/**
 * Merge a config update into current values. Entries without a value
 * remove the key.
 */
export function mergeConfig(
  current: ReadonlyMap<string, string>,
  update: ApiConfigList,
): Map<string, string> {
  const merged = new Map(current);
  for (const { name, value } of update) {
    if (value === undefined || value === null) {
      merged.delete(name);
    } else {
      merged.set(name, value);
    }
  }
  return merged;
}
