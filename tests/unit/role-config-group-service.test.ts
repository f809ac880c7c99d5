import { describe, it, expect, vi } from 'vitest';
import { ApiConfigList } from '../../src/model/config.js';
import { ApiRoleConfigGroupList } from '../../src/model/role-config-group.js';
import { ApiError } from '../../src/errors.js';
import { RoleConfigGroupService, mergeConfig } from '../../src/services/role-config-group-service.js';
import { sampleStore } from '../fixtures/inventory.js';

const HDFS = { clusterName: 'cluster1', serviceName: 'hdfs1' };

describe('RoleConfigGroupService', () => {
  it('rejects duplicate names within one create request', async () => {
    const service = new RoleConfigGroupService(sampleStore());
    const request = new ApiRoleConfigGroupList([
      { name: 'twin', roleType: 'DATANODE' },
      { name: 'twin', roleType: 'DATANODE' },
    ]);
    await expect(service.createGroups(HDFS, request)).rejects.toMatchObject({
      status: 409,
      body: { error: 'conflict', message: 'Role config group twin already exists in cluster1/hdfs1' },
    });
    expect((await service.readGroups(HDFS)).size).toBe(2);
  });

  it('keeps supplied config and display name on create', async () => {
    const service = new RoleConfigGroupService(sampleStore());
    const created = await service.createGroups(
      HDFS,
      new ApiRoleConfigGroupList([
        { name: 'g1', displayName: 'Group One', roleType: 'DATANODE', base: true, config: [{ name: 'k', value: 'v' }] },
      ]),
    );
    expect(created.get(0)).toEqual({
      name: 'g1',
      displayName: 'Group One',
      roleType: 'DATANODE',
      base: false,
      serviceRef: HDFS,
      config: [{ name: 'k', value: 'v' }],
    });
  });

  it('logs group creation', async () => {
    const log = vi.fn();
    const service = new RoleConfigGroupService(sampleStore(), log);
    await service.createGroups(HDFS, new ApiRoleConfigGroupList([{ name: 'g1', roleType: 'DATANODE' }]));
    expect(log).toHaveBeenCalledWith('info', {
      event: 'role_config_groups_created',
      service: 'cluster1/hdfs1',
      groups: ['g1'],
    });
  });

  it('roles follow a renamed group', async () => {
    const service = new RoleConfigGroupService(sampleStore());
    await service.updateGroup(HDFS, 'hdfs1-NAMENODE-BASE', {
      name: 'hdfs1-NAMENODE-main',
      roleType: 'NAMENODE',
    });
    const roles = await service.readRoles(HDFS, 'hdfs1-NAMENODE-main');
    expect(roles.getRoles().map((r) => r.name)).toEqual(['hdfs1-NAMENODE-1']);
  });

  it('refuses to rename onto an existing group', async () => {
    const service = new RoleConfigGroupService(sampleStore());
    await expect(
      service.updateGroup(HDFS, 'hdfs1-DATANODE-BASE', { name: 'hdfs1-NAMENODE-BASE', roleType: 'DATANODE' }),
    ).rejects.toMatchObject({ status: 409 });
  });

  it('moves nothing when any role fails validation', async () => {
    const store = sampleStore();
    const service = new RoleConfigGroupService(store);
    await service.createGroups(HDFS, new ApiRoleConfigGroupList([{ name: 'dn-fast', roleType: 'DATANODE' }]));

    await expect(
      service.moveRoles(HDFS, 'dn-fast', ['hdfs1-DATANODE-1', 'hdfs1-NAMENODE-1']),
    ).rejects.toBeInstanceOf(ApiError);
    expect((await service.readRoles(HDFS, 'dn-fast')).size).toBe(0);
  });

  it('reports a role type without a base group', async () => {
    const store = sampleStore();
    const service = new RoleConfigGroupService(store);
    // Base groups cannot be deleted through the service
    await store.deleteGroup(HDFS, 'hdfs1-NAMENODE-BASE');
    await expect(service.moveRolesToBaseGroup(HDFS, ['hdfs1-NAMENODE-1'])).rejects.toMatchObject({
      status: 400,
      body: { message: 'No base role config group for role type NAMENODE in cluster1/hdfs1' },
    });
  });

  it('readConfig returns an empty list for a group without config', async () => {
    const service = new RoleConfigGroupService(sampleStore());
    const config = await service.readConfig(HDFS, 'hdfs1-NAMENODE-BASE');
    expect(config.items).toEqual([]);
  });
});

describe('mergeConfig', () => {
  it('sets, overwrites and removes keys', () => {
    const current = new Map([
      ['a', '1'],
      ['b', '2'],
    ]);
    const merged = mergeConfig(
      current,
      new ApiConfigList([
        { name: 'a', value: '10' },
        { name: 'b', value: null },
        { name: 'c', value: '3' },
      ]),
    );
    expect([...merged]).toEqual([
      ['a', '10'],
      ['c', '3'],
    ]);
    expect([...current]).toEqual([
      ['a', '1'],
      ['b', '2'],
    ]);
  });
});
