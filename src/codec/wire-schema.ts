import type { z } from 'zod';

/**
 * Wire schema - the per-type field-name table shared by the JSON and XML codecs.
 *
 * A model declares its mapping once as data (property → JSON name, XML
 * name, field type). Both codecs walk the same table.
 */

/** Fixed JSON field and XML wrapper element for every list envelope. */
export const ITEMS_ATTR = 'items';

export type ScalarType = 'string' | 'number' | 'boolean';

export interface RecordType {
  readonly kind: 'record';
  readonly fields: readonly FieldMapping[];
}

/**
 * A nested collection, encoded with the envelope convention:
 * `{ "items": [...] }` in JSON, `<items><element/>...</items>` in XML.
 */
export interface ListType {
  readonly kind: 'list';
  readonly element: string;
  readonly of: FieldType;
}

export type FieldType = ScalarType | RecordType | ListType;

export interface FieldMapping {
  readonly property: string;
  readonly json: string;
  readonly xml: string;
  readonly type: FieldType;
}

/**
 * Declare a field. Wire names default to the property name; pass
 * `{ json, xml }` to override either one.
 */
export function field(
  property: string,
  type: FieldType,
  names: { json?: string; xml?: string } = {},
): FieldMapping {
  return {
    property,
    json: names.json ?? property,
    xml: names.xml ?? property,
    type,
  };
}

export function record(...fields: FieldMapping[]): RecordType {
  return { kind: 'record', fields };
}

export function listOf(element: string, of: FieldType): ListType {
  return { kind: 'list', element, of };
}

/**
 * Everything the codecs need to read and write one envelope type.
 *
 * `item` validates each decoded element; `create` rebuilds the envelope
 * from the decoded sequence.
 */
export interface ListSchema<T, L> {
  readonly xmlRoot: string;
  readonly xmlElement: string;
  readonly itemType: FieldType;
  readonly item: z.ZodType<T, z.ZodTypeDef, unknown>;
  create(values: T[]): L;
}

export function isRecordType(type: FieldType): type is RecordType {
  return typeof type === 'object' && type.kind === 'record';
}

export function isListType(type: FieldType): type is ListType {
  return typeof type === 'object' && type.kind === 'list';
}

/** Narrow an unknown wire value to a plain object. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
