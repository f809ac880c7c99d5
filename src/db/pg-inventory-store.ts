/**
 * PostgresInventoryStore - PostgreSQL-backed InventoryStore.
 *
 * Records are kept whole in JSONB; the columns used for lookups
 * (names, role type, group membership) are extracted alongside. The
 * management service is stored with cluster_name ''.
 */
import type pg from 'pg';
import type { DbPool } from './client.js';
import { withTransaction } from './transaction.js';
import type { LogCallback } from '../middleware/logger.js';
import type { ApiCluster } from '../model/cluster.js';
import type { ApiRoleConfigGroup } from '../model/role-config-group.js';
import type { ApiRole } from '../model/role.js';
import type { ApiServiceRef } from '../model/service-ref.js';
import {
  groupExistsError,
  serviceKey,
  type InventoryStore,
  type RoleAssignment,
  type StoredService,
} from '../services/inventory-store.js';

const UNIQUE_VIOLATION = '23505';

function clusterColumn(ref: ApiServiceRef): string {
  return ref.clusterName ?? '';
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

export class PostgresInventoryStore implements InventoryStore {
  constructor(
    private readonly pool: DbPool,
    private readonly log: LogCallback | null = null,
  ) {}

  async listClusters(): Promise<ApiCluster[]> {
    const result = await this.pool.query<{ cluster: ApiCluster }>(
      'SELECT cluster FROM clusters ORDER BY created_at, name',
    );
    return result.rows.map((row) => row.cluster);
  }

  async getCluster(name: string): Promise<ApiCluster | undefined> {
    const result = await this.pool.query<{ cluster: ApiCluster }>(
      'SELECT cluster FROM clusters WHERE name = $1',
      [name],
    );
    return result.rows[0]?.cluster;
  }

  async getService(ref: ApiServiceRef): Promise<StoredService | undefined> {
    const result = await this.pool.query<{ cluster_name: string; name: string; type: string }>(
      'SELECT cluster_name, name, type FROM services WHERE cluster_name = $1 AND name = $2',
      [clusterColumn(ref), ref.serviceName],
    );
    const row = result.rows[0];
    if (!row) return undefined;
    return {
      ...(row.cluster_name ? { clusterName: row.cluster_name } : {}),
      name: row.name,
      type: row.type,
    };
  }

  async listGroups(ref: ApiServiceRef): Promise<ApiRoleConfigGroup[]> {
    const result = await this.pool.query<{ grp: ApiRoleConfigGroup }>(
      `SELECT grp FROM role_config_groups
       WHERE cluster_name = $1 AND service_name = $2 ORDER BY name`,
      [clusterColumn(ref), ref.serviceName],
    );
    return result.rows.map((row) => row.grp);
  }

  async getGroup(ref: ApiServiceRef, name: string): Promise<ApiRoleConfigGroup | undefined> {
    const result = await this.pool.query<{ grp: ApiRoleConfigGroup }>(
      `SELECT grp FROM role_config_groups
       WHERE cluster_name = $1 AND service_name = $2 AND name = $3`,
      [clusterColumn(ref), ref.serviceName, name],
    );
    return result.rows[0]?.grp;
  }

  async insertGroups(ref: ApiServiceRef, groups: ApiRoleConfigGroup[]): Promise<void> {
    await this.transaction(async (client) => {
      for (const group of groups) {
        await insertGroup(client, ref, group);
      }
    });
  }

  async replaceGroup(ref: ApiServiceRef, name: string, group: ApiRoleConfigGroup): Promise<void> {
    await this.transaction(async (client) => {
      await client.query(
        `DELETE FROM role_config_groups
         WHERE cluster_name = $1 AND service_name = $2 AND name = $3`,
        [clusterColumn(ref), ref.serviceName, name],
      );
      await insertGroup(client, ref, group);
      if (name !== group.name) {
        // Roles follow their group across a rename
        await client.query(
          `UPDATE roles
           SET group_name = $4,
               role = jsonb_set(role, '{roleConfigGroupRef}', jsonb_build_object('roleConfigGroupName', $4::text))
           WHERE cluster_name = $1 AND service_name = $2 AND group_name = $3`,
          [clusterColumn(ref), ref.serviceName, name, group.name],
        );
      }
    });
  }

  async deleteGroup(ref: ApiServiceRef, name: string): Promise<void> {
    await this.pool.query(
      `DELETE FROM role_config_groups
       WHERE cluster_name = $1 AND service_name = $2 AND name = $3`,
      [clusterColumn(ref), ref.serviceName, name],
    );
  }

  async listRoles(ref: ApiServiceRef): Promise<ApiRole[]> {
    const result = await this.pool.query<{ role: ApiRole }>(
      `SELECT role FROM roles
       WHERE cluster_name = $1 AND service_name = $2 ORDER BY name`,
      [clusterColumn(ref), ref.serviceName],
    );
    return result.rows.map((row) => row.role);
  }

  async assignRoles(ref: ApiServiceRef, assignments: RoleAssignment[]): Promise<void> {
    await this.transaction(async (client) => {
      for (const { roleName, groupName } of assignments) {
        const result = await client.query(
          `UPDATE roles
           SET group_name = $4,
               role = jsonb_set(role, '{roleConfigGroupRef}', jsonb_build_object('roleConfigGroupName', $4::text))
           WHERE cluster_name = $1 AND service_name = $2 AND name = $3`,
          [clusterColumn(ref), ref.serviceName, roleName, groupName],
        );
        if (result.rowCount === 0) {
          throw new Error(`Role ${roleName} not found in ${serviceKey(ref)}`);
        }
      }
    });
  }

  async getManagerConfig(): Promise<Map<string, string>> {
    const result = await this.pool.query<{ name: string; value: string }>(
      'SELECT name, value FROM manager_config ORDER BY name',
    );
    return new Map(result.rows.map((row) => [row.name, row.value]));
  }

  async putManagerConfig(config: ReadonlyMap<string, string>): Promise<void> {
    await this.transaction(async (client) => {
      await client.query('DELETE FROM manager_config');
      for (const [name, value] of config) {
        await client.query('INSERT INTO manager_config (name, value) VALUES ($1, $2)', [name, value]);
      }
    });
  }

  private transaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, fn, this.log);
  }
}

/** Insert one group; a taken (service, name) key becomes a 409. */
async function insertGroup(
  client: pg.PoolClient,
  ref: ApiServiceRef,
  group: ApiRoleConfigGroup,
): Promise<void> {
  try {
    await client.query(
      `INSERT INTO role_config_groups (cluster_name, service_name, name, role_type, is_base, grp)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        clusterColumn(ref),
        ref.serviceName,
        group.name,
        group.roleType,
        group.base ?? false,
        JSON.stringify(group),
      ],
    );
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw groupExistsError(ref, group.name);
    }
    throw err;
  }
}
