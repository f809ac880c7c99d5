import { WireFormatError } from '../errors.js';
import type { ApiListBase } from '../model/list-base.js';
import type { z } from 'zod';
import {
  ITEMS_ATTR,
  isListType,
  isPlainObject,
  isRecordType,
  type FieldType,
  type ListSchema,
  type RecordType,
} from './wire-schema.js';

/**
 * JSON codec for list envelopes.
 *
 * Encodes `{ "items": [...] }`, renaming each field through the type's
 * wire schema. Decoding maps JSON names back to properties and validates
 * every element with the type's zod model.
 */

export function encodeListJson<T>(list: ApiListBase<T>): { items: unknown[] } {
  const { itemType } = list.schema;
  return { [ITEMS_ATTR]: list.items.map((item) => toJsonValue(item, itemType)) };
}

export function stringifyListJson<T>(list: ApiListBase<T>): string {
  return JSON.stringify(encodeListJson(list));
}

/**
 * Rebuild an envelope from a JSON value or JSON text.
 * A missing or null `items` field decodes to an empty envelope.
 */
export function decodeListJson<T, L>(input: unknown, schema: ListSchema<T, L>): L {
  const wire = typeof input === 'string' ? parseJson(input) : input;
  if (!isPlainObject(wire)) {
    throw new WireFormatError('json', `expected an object with an "${ITEMS_ATTR}" array`);
  }

  const rawItems = wire[ITEMS_ATTR];
  if (rawItems === undefined || rawItems === null) {
    return schema.create([]);
  }
  if (!Array.isArray(rawItems)) {
    throw new WireFormatError('json', `"${ITEMS_ATTR}" must be an array`);
  }

  const values = rawItems.map((raw, index) =>
    validate(fromJsonValue(raw, schema.itemType), schema.item, `${ITEMS_ATTR}[${index}]`),
  );
  return schema.create(values);
}

/** Encode a single record (not an envelope) through its field table. */
export function encodeRecordJson(value: unknown, type: FieldType): unknown {
  return toJsonValue(value, type);
}

/** Decode and validate a single record from a JSON value or JSON text. */
export function decodeRecordJson<T>(
  input: unknown,
  type: FieldType,
  model: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const wire = typeof input === 'string' ? parseJson(input) : input;
  return validate(fromJsonValue(wire, type), model, '$');
}

function validate<T>(value: unknown, model: z.ZodType<T, z.ZodTypeDef, unknown>, at: string): T {
  const parsed = model.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    throw new WireFormatError('json', `${at}${where}: ${issue?.message ?? 'invalid value'}`);
  }
  return parsed.data;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new WireFormatError('json', err instanceof Error ? err.message : String(err));
  }
}

function toJsonValue(value: unknown, type: FieldType): unknown {
  if (isRecordType(type)) {
    return isPlainObject(value) ? recordToJson(value, type) : value;
  }
  if (isListType(type)) {
    const items = Array.isArray(value) ? value : [];
    return { [ITEMS_ATTR]: items.map((item) => toJsonValue(item, type.of)) };
  }
  return value;
}

function recordToJson(source: Record<string, unknown>, type: RecordType): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const mapping of type.fields) {
    const value = source[mapping.property];
    if (value === undefined || value === null) continue;
    out[mapping.json] = toJsonValue(value, mapping.type);
  }
  return out;
}

function fromJsonValue(value: unknown, type: FieldType): unknown {
  if (isRecordType(type)) {
    if (!isPlainObject(value)) return value;
    const out: Record<string, unknown> = {};
    for (const mapping of type.fields) {
      const raw = value[mapping.json];
      if (raw === undefined || raw === null) continue;
      out[mapping.property] = fromJsonValue(raw, mapping.type);
    }
    return out;
  }
  if (isListType(type)) {
    if (value === null) return undefined;
    // Accept both the envelope form and a bare array
    const items = isPlainObject(value) ? value[ITEMS_ATTR] ?? [] : value;
    return Array.isArray(items) ? items.map((item) => fromJsonValue(item, type.of)) : items;
  }
  return value;
}
