import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ApiError } from '../errors.js';
import { ApiClusterSchema, type ApiCluster } from '../model/cluster.js';
import { ApiRoleConfigGroupSchema, type ApiRoleConfigGroup } from '../model/role-config-group.js';
import { ApiRoleSchema, type ApiRole } from '../model/role.js';
import {
  ApiServiceRefSchema,
  formatServiceRef,
  type ApiServiceRef,
} from '../model/service-ref.js';

/** A service known to the inventory. */
export interface StoredService {
  clusterName?: string;
  name: string;
  type: string;
}

export interface RoleAssignment {
  roleName: string;
  groupName: string;
}

/**
 * Persistence seam for clusters, services, role config groups, roles and
 * manager configuration. Business rules live in the services that use
 * it; implementations only store and fetch.
 */
export interface InventoryStore {
  listClusters(): Promise<ApiCluster[]>;
  getCluster(name: string): Promise<ApiCluster | undefined>;
  getService(ref: ApiServiceRef): Promise<StoredService | undefined>;

  listGroups(ref: ApiServiceRef): Promise<ApiRoleConfigGroup[]>;
  getGroup(ref: ApiServiceRef, name: string): Promise<ApiRoleConfigGroup | undefined>;
  /** Rejects with a 409 ApiError, inserting nothing, when any name is taken. */
  insertGroups(ref: ApiServiceRef, groups: ApiRoleConfigGroup[]): Promise<void>;
  /** Rejects with a 409 ApiError when a rename lands on an existing group. */
  replaceGroup(ref: ApiServiceRef, name: string, group: ApiRoleConfigGroup): Promise<void>;
  deleteGroup(ref: ApiServiceRef, name: string): Promise<void>;

  listRoles(ref: ApiServiceRef): Promise<ApiRole[]>;
  /** Apply every assignment or none of them. */
  assignRoles(ref: ApiServiceRef, assignments: RoleAssignment[]): Promise<void>;

  getManagerConfig(): Promise<Map<string, string>>;
  putManagerConfig(config: ReadonlyMap<string, string>): Promise<void>;
}

export const InventorySeedSchema = z.object({
  clusters: z.array(ApiClusterSchema).default([]),
  services: z
    .array(
      z.object({
        clusterName: z.string().min(1).optional(),
        name: z.string().min(1),
        type: z.string().min(1),
      }),
    )
    .default([]),
  roleConfigGroups: z
    .array(ApiRoleConfigGroupSchema.extend({ serviceRef: ApiServiceRefSchema }))
    .default([]),
  roles: z.array(ApiRoleSchema.extend({ serviceRef: ApiServiceRefSchema })).default([]),
  managerConfig: z.record(z.string()).default({}),
});

export type InventorySeed = z.infer<typeof InventorySeedSchema>;

/**
 * Read and validate an inventory seed file.
 * Throws with the first validation issue when the file is malformed.
 */
export function loadInventorySeed(path: string): InventorySeed {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = InventorySeedSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid inventory seed ${path}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(),
    );
  }
  return parsed.data;
}

export function serviceKey(ref: ApiServiceRef): string {
  return `${ref.clusterName ?? ''}/${ref.serviceName}`;
}

export function groupExistsError(ref: ApiServiceRef, name: string): ApiError {
  return ApiError.conflict(`Role config group ${name} already exists in ${formatServiceRef(ref)}`);
}

/**
 * Map-backed InventoryStore. The default when no DATABASE_URL is set,
 * and the store the route tests run against.
 */
export class InMemoryInventoryStore implements InventoryStore {
  private readonly clusters = new Map<string, ApiCluster>();
  private readonly services = new Map<string, StoredService>();
  /** service key → group name → group */
  private readonly groups = new Map<string, Map<string, ApiRoleConfigGroup>>();
  /** service key → role name → role */
  private readonly roles = new Map<string, Map<string, ApiRole>>();
  private managerConfig = new Map<string, string>();

  constructor(seed?: Partial<InventorySeed>) {
    for (const cluster of seed?.clusters ?? []) {
      this.clusters.set(cluster.name, cluster);
    }
    for (const service of seed?.services ?? []) {
      this.services.set(
        serviceKey({ clusterName: service.clusterName, serviceName: service.name }),
        service,
      );
    }
    for (const group of seed?.roleConfigGroups ?? []) {
      this.groupsOf(group.serviceRef).set(group.name, group);
    }
    for (const role of seed?.roles ?? []) {
      this.rolesOf(role.serviceRef).set(role.name, role);
    }
    this.managerConfig = new Map(Object.entries(seed?.managerConfig ?? {}));
  }

  async listClusters(): Promise<ApiCluster[]> {
    return [...this.clusters.values()];
  }

  async getCluster(name: string): Promise<ApiCluster | undefined> {
    return this.clusters.get(name);
  }

  async getService(ref: ApiServiceRef): Promise<StoredService | undefined> {
    return this.services.get(serviceKey(ref));
  }

  async listGroups(ref: ApiServiceRef): Promise<ApiRoleConfigGroup[]> {
    return [...this.groupsOf(ref).values()];
  }

  async getGroup(ref: ApiServiceRef, name: string): Promise<ApiRoleConfigGroup | undefined> {
    return this.groupsOf(ref).get(name);
  }

  // No await between the name check and the write
  async insertGroups(ref: ApiServiceRef, groups: ApiRoleConfigGroup[]): Promise<void> {
    const byName = this.groupsOf(ref);
    const seen = new Set<string>();
    for (const group of groups) {
      if (byName.has(group.name) || seen.has(group.name)) {
        throw groupExistsError(ref, group.name);
      }
      seen.add(group.name);
    }
    for (const group of groups) {
      byName.set(group.name, group);
    }
  }

  async replaceGroup(ref: ApiServiceRef, name: string, group: ApiRoleConfigGroup): Promise<void> {
    const byName = this.groupsOf(ref);
    if (name !== group.name) {
      if (byName.has(group.name)) {
        throw groupExistsError(ref, group.name);
      }
      byName.delete(name);
      // Roles follow their group across a rename
      for (const [roleName, role] of this.rolesOf(ref)) {
        if (role.roleConfigGroupRef?.roleConfigGroupName === name) {
          this.rolesOf(ref).set(roleName, {
            ...role,
            roleConfigGroupRef: { roleConfigGroupName: group.name },
          });
        }
      }
    }
    byName.set(group.name, group);
  }

  async deleteGroup(ref: ApiServiceRef, name: string): Promise<void> {
    this.groupsOf(ref).delete(name);
  }

  async listRoles(ref: ApiServiceRef): Promise<ApiRole[]> {
    return [...this.rolesOf(ref).values()];
  }

  async assignRoles(ref: ApiServiceRef, assignments: RoleAssignment[]): Promise<void> {
    const byName = this.rolesOf(ref);
    const missing = assignments.find((a) => !byName.has(a.roleName));
    if (missing) {
      throw new Error(`Role ${missing.roleName} not found in ${serviceKey(ref)}`);
    }
    for (const { roleName, groupName } of assignments) {
      const role = byName.get(roleName);
      if (!role) continue;
      byName.set(roleName, { ...role, roleConfigGroupRef: { roleConfigGroupName: groupName } });
    }
  }

  async getManagerConfig(): Promise<Map<string, string>> {
    return new Map(this.managerConfig);
  }

  async putManagerConfig(config: ReadonlyMap<string, string>): Promise<void> {
    this.managerConfig = new Map(config);
  }

  private groupsOf(ref: ApiServiceRef): Map<string, ApiRoleConfigGroup> {
    const key = serviceKey(ref);
    let byName = this.groups.get(key);
    if (!byName) {
      byName = new Map();
      this.groups.set(key, byName);
    }
    return byName;
  }

  private rolesOf(ref: ApiServiceRef): Map<string, ApiRole> {
    const key = serviceKey(ref);
    let byName = this.roles.get(key);
    if (!byName) {
      byName = new Map();
      this.roles.set(key, byName);
    }
    return byName;
  }
}
