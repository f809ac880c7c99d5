import { Hono, type Context } from 'hono';
import { decodeRecordJson, encodeRecordJson } from '../codec/json-codec.js';
import { ApiConfigList } from '../model/config.js';
import {
  API_ROLE_CONFIG_GROUP_FIELDS,
  ApiRoleConfigGroupList,
  ApiRoleConfigGroupSchema,
  type ApiRoleConfigGroup,
} from '../model/role-config-group.js';
import { ApiRoleNameList } from '../model/role.js';
import { managementServiceRef, type ApiServiceRef } from '../model/service-ref.js';
import type { RoleConfigGroupService } from '../services/role-config-group-service.js';
import { readListBody, respondWithList } from '../utils/content-negotiation.js';
import { requirePathParam } from '../validation.js';

/**
 * Role config group routes for one service.
 *
 * Mounted twice: under `/clusters/:clusterName/services/:serviceName/roleConfigGroups`
 * and under `/cm/service/roleConfigGroups` for the management service.
 *
 * - POST   /                      - create groups (body: roleConfigGroupList)
 * - GET    /                      - list groups
 * - PUT    /roles                 - move roles to their base groups (body: roleNameList)
 * - GET    /:groupName            - read a group
 * - PUT    /:groupName            - update a group
 * - DELETE /:groupName            - delete a group
 * - GET    /:groupName/config     - read group config
 * - PUT    /:groupName/config     - merge group config
 * - GET    /:groupName/roles      - roles in the group
 * - PUT    /:groupName/roles      - move roles into the group (body: roleNameList)
 */
export function createRoleConfigGroupRoutes(
  service: RoleConfigGroupService,
  scope: 'cluster' | 'management',
): Hono {
  const app = new Hono();

  const serviceRef = (c: Context): ApiServiceRef =>
    scope === 'management'
      ? managementServiceRef()
      : {
          clusterName: requirePathParam(c, 'clusterName'),
          serviceName: requirePathParam(c, 'serviceName'),
        };

  const groupJson = (c: Context, group: ApiRoleConfigGroup) =>
    c.json(encodeRecordJson(group, API_ROLE_CONFIG_GROUP_FIELDS));

  app.post('/', async (c) => {
    const ref = serviceRef(c);
    const requested = await readListBody(c, ApiRoleConfigGroupList.SCHEMA);
    return respondWithList(c, await service.createGroups(ref, requested), 201);
  });

  app.get('/', async (c) => {
    return respondWithList(c, await service.readGroups(serviceRef(c)));
  });

  // Registered before /:groupName so "roles" is never read as a group name
  app.put('/roles', async (c) => {
    const ref = serviceRef(c);
    const names = await readListBody(c, ApiRoleNameList.SCHEMA);
    return respondWithList(c, await service.moveRolesToBaseGroup(ref, names.getRoleNames()));
  });

  app.get('/:groupName', async (c) => {
    const group = await service.readGroup(serviceRef(c), requirePathParam(c, 'groupName'));
    return groupJson(c, group);
  });

  app.put('/:groupName', async (c) => {
    const ref = serviceRef(c);
    const name = requirePathParam(c, 'groupName');
    const update = decodeRecordJson(
      await c.req.text(),
      API_ROLE_CONFIG_GROUP_FIELDS,
      ApiRoleConfigGroupSchema,
    );
    return groupJson(c, await service.updateGroup(ref, name, update));
  });

  app.delete('/:groupName', async (c) => {
    const group = await service.deleteGroup(serviceRef(c), requirePathParam(c, 'groupName'));
    return groupJson(c, group);
  });

  app.get('/:groupName/config', async (c) => {
    return respondWithList(
      c,
      await service.readConfig(serviceRef(c), requirePathParam(c, 'groupName')),
    );
  });

  app.put('/:groupName/config', async (c) => {
    const ref = serviceRef(c);
    const name = requirePathParam(c, 'groupName');
    const update = await readListBody(c, ApiConfigList.SCHEMA);
    return respondWithList(c, await service.updateConfig(ref, name, update));
  });

  app.get('/:groupName/roles', async (c) => {
    return respondWithList(
      c,
      await service.readRoles(serviceRef(c), requirePathParam(c, 'groupName')),
    );
  });

  app.put('/:groupName/roles', async (c) => {
    const ref = serviceRef(c);
    const name = requirePathParam(c, 'groupName');
    const names = await readListBody(c, ApiRoleNameList.SCHEMA);
    return respondWithList(c, await service.moveRoles(ref, name, names.getRoleNames()));
  });

  return app;
}
