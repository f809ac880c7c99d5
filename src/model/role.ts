import { z } from 'zod';
import { ApiListBase } from './list-base.js';
import { ApiServiceRefSchema, API_SERVICE_REF_FIELDS } from './service-ref.js';
import { field, record, type ListSchema } from '../codec/wire-schema.js';

export const ApiRoleSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  hostId: z.string().optional(),
  serviceRef: ApiServiceRefSchema.optional(),
  roleConfigGroupRef: z
    .object({ roleConfigGroupName: z.string().min(1) })
    .optional(),
});

export type ApiRole = z.infer<typeof ApiRoleSchema>;

export const API_ROLE_FIELDS = record(
  field('name', 'string'),
  field('type', 'string'),
  field('hostId', 'string', { xml: 'hostRef' }),
  field('serviceRef', API_SERVICE_REF_FIELDS),
  field('roleConfigGroupRef', record(field('roleConfigGroupName', 'string'))),
);

export class ApiRoleList extends ApiListBase<ApiRole> {
  static readonly SCHEMA: ListSchema<ApiRole, ApiRoleList> = {
    xmlRoot: 'roleList',
    xmlElement: 'role',
    itemType: API_ROLE_FIELDS,
    item: ApiRoleSchema,
    create: (values) => new ApiRoleList(values),
  };

  get schema(): ListSchema<ApiRole, ApiRoleList> {
    return ApiRoleList.SCHEMA;
  }

  getRoles(): readonly ApiRole[] {
    return this.values;
  }
}

/** A list of role names, the request body of role moves. */
export class ApiRoleNameList extends ApiListBase<string> {
  static readonly SCHEMA: ListSchema<string, ApiRoleNameList> = {
    xmlRoot: 'roleNameList',
    xmlElement: 'roleName',
    itemType: 'string',
    item: z.string().min(1),
    create: (values) => new ApiRoleNameList(values),
  };

  get schema(): ListSchema<string, ApiRoleNameList> {
    return ApiRoleNameList.SCHEMA;
  }

  getRoleNames(): readonly string[] {
    return this.values;
  }
}
