import { z } from 'zod';
import { ApiListBase } from './list-base.js';
import { ApiConfigSchema, API_CONFIG_LIST_TYPE } from './config.js';
import { ApiServiceRefSchema, API_SERVICE_REF_FIELDS } from './service-ref.js';
import { field, record, type ListSchema } from '../codec/wire-schema.js';
import { ResourceNameSchema } from '../validation.js';

/**
 * A role config group: a named set of configuration shared by roles of
 * one role type within a service. `base` and `serviceRef` are read-only
 * and filled in by the server.
 */
export const ApiRoleConfigGroupSchema = z.object({
  name: ResourceNameSchema,
  displayName: z.string().optional(),
  roleType: z.string().min(1),
  base: z.boolean().optional(),
  serviceRef: ApiServiceRefSchema.optional(),
  config: z.array(ApiConfigSchema).optional(),
});

export type ApiRoleConfigGroup = z.infer<typeof ApiRoleConfigGroupSchema>;

export const API_ROLE_CONFIG_GROUP_FIELDS = record(
  field('name', 'string'),
  field('displayName', 'string'),
  field('roleType', 'string'),
  field('base', 'boolean'),
  field('serviceRef', API_SERVICE_REF_FIELDS),
  field('config', API_CONFIG_LIST_TYPE),
);

export class ApiRoleConfigGroupList extends ApiListBase<ApiRoleConfigGroup> {
  static readonly SCHEMA: ListSchema<ApiRoleConfigGroup, ApiRoleConfigGroupList> = {
    xmlRoot: 'roleConfigGroupList',
    xmlElement: 'roleConfigGroup',
    itemType: API_ROLE_CONFIG_GROUP_FIELDS,
    item: ApiRoleConfigGroupSchema,
    create: (values) => new ApiRoleConfigGroupList(values),
  };

  get schema(): ListSchema<ApiRoleConfigGroup, ApiRoleConfigGroupList> {
    return ApiRoleConfigGroupList.SCHEMA;
  }

  getGroups(): readonly ApiRoleConfigGroup[] {
    return this.values;
  }
}
