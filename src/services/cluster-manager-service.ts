import { ApiError } from '../errors.js';
import { ApiConfigList } from '../model/config.js';
import type { ApiKerberosInfo, ApiScmDbInfo, ApiVersionInfo } from '../model/manager.js';
import {
  SUPPORTED_API_VERSIONS,
  type ClusterManagerResourceV14,
} from '../resources/cluster-manager-resource.js';
import type { DbPool } from '../db/client.js';
import { probeScmDbInfo } from '../db/scm-db-info.js';
import type { InventoryStore } from './inventory-store.js';
import { mergeConfig } from './role-config-group-service.js';
import type { LogCallback } from '../middleware/logger.js';

export const SERVER_VERSION = '1.0.0';

/** Manager config keys read by getKerberosInfo. */
export const KERBEROS_REALM_KEY = 'SECURITY_REALM';
export const KDC_HOST_KEY = 'KDC_HOST';

export interface ClusterManagerServiceDeps {
  store: InventoryStore;
  /** Null when DATABASE_URL is not configured. */
  dbPool: DbPool | null;
  databaseUrl: string | null;
  embeddedDbUsed: boolean;
  log?: LogCallback;
}

/**
 * The manager resource at API version 14. Older API versions are served
 * by the same instance, mounted with a narrower operation table.
 */
export class ClusterManagerService implements ClusterManagerResourceV14 {
  constructor(private readonly deps: ClusterManagerServiceDeps) {}

  async getVersion(): Promise<ApiVersionInfo> {
    return {
      version: SERVER_VERSION,
      apiVersions: [...SUPPORTED_API_VERSIONS],
      snapshot: SERVER_VERSION.endsWith('-SNAPSHOT'),
    };
  }

  async getConfig(): Promise<ApiConfigList> {
    return ApiConfigList.fromMap(await this.deps.store.getManagerConfig());
  }

  async updateConfig(config: ApiConfigList): Promise<ApiConfigList> {
    const merged = mergeConfig(await this.deps.store.getManagerConfig(), config);
    await this.deps.store.putManagerConfig(merged);
    this.deps.log?.('info', {
      event: 'manager_config_updated',
      keys: config.items.map((c) => c.name),
    });
    return ApiConfigList.fromMap(merged);
  }

  async getKerberosInfo(): Promise<ApiKerberosInfo> {
    const config = await this.deps.store.getManagerConfig();
    const realm = config.get(KERBEROS_REALM_KEY);
    const kdcHost = config.get(KDC_HOST_KEY);
    return {
      kerberized: Boolean(realm),
      ...(realm ? { kerberosRealm: realm } : {}),
      ...(kdcHost ? { kdcHost } : {}),
    };
  }

  async getScmDbInfo(): Promise<ApiScmDbInfo> {
    const { dbPool, databaseUrl } = this.deps;
    if (!dbPool || !databaseUrl) {
      throw ApiError.unavailable('database_unavailable', 'Manager database is not configured');
    }
    try {
      return await probeScmDbInfo(dbPool, {
        connectionString: databaseUrl,
        embeddedDbUsed: this.deps.embeddedDbUsed,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.deps.log?.('error', { event: 'scm_db_probe_failed', message });
      throw ApiError.unavailable('database_unreachable', `Manager database unreachable: ${message}`);
    }
  }
}
