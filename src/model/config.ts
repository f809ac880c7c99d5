import { z } from 'zod';
import { ApiListBase } from './list-base.js';
import { field, listOf, record, type ListSchema } from '../codec/wire-schema.js';

/**
 * A single configuration value. A missing `value` means the parameter
 * is unset (or, on update, should be reset to its default).
 */
export const ApiConfigSchema = z.object({
  name: z.string().min(1),
  value: z.string().nullable().optional(),
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const API_CONFIG_FIELDS = record(
  field('name', 'string'),
  field('value', 'string'),
);

/** Nested-list form used when a config list is a field of another record. */
export const API_CONFIG_LIST_TYPE = listOf('config', API_CONFIG_FIELDS);

export class ApiConfigList extends ApiListBase<ApiConfig> {
  static readonly SCHEMA: ListSchema<ApiConfig, ApiConfigList> = {
    xmlRoot: 'configList',
    xmlElement: 'config',
    itemType: API_CONFIG_FIELDS,
    item: ApiConfigSchema,
    create: (values) => new ApiConfigList(values),
  };

  get schema(): ListSchema<ApiConfig, ApiConfigList> {
    return ApiConfigList.SCHEMA;
  }

  /** Configs as a name → value map, dropping unset entries. */
  toMap(): Map<string, string> {
    const map = new Map<string, string>();
    for (const config of this.values) {
      if (config.value !== undefined && config.value !== null) {
        map.set(config.name, config.value);
      }
    }
    return map;
  }

  static fromMap(map: ReadonlyMap<string, string>): ApiConfigList {
    const names = [...map.keys()].sort();
    return new ApiConfigList(
      names.map((name) => ({ name, value: map.get(name) })),
    );
  }
}
