import type { z } from 'zod';
import { decodeListJson, decodeRecordJson } from '../codec/json-codec.js';
import type { FieldType, ListSchema } from '../codec/wire-schema.js';
import { ApiError, WireFormatError } from '../errors.js';

function invalidResponse(message: string): ApiError {
  return new ApiError(502, { error: 'invalid_response', message });
}

function fromWireFormatError(err: unknown): unknown {
  return err instanceof WireFormatError
    ? invalidResponse(`Unexpected response shape: ${err.message}`)
    : err;
}

/**
 * Validate a response body against its model. A server answering with
 * the wrong shape is reported as a 502 from the client's point of view.
 */
export function parseResponse<T>(model: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = model.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw invalidResponse(
      `Unexpected response shape at ${issue?.path.join('.') || '$'}: ${issue?.message ?? 'invalid'}`,
    );
  }
  return parsed.data;
}

/** Decode a list envelope from a response; a malformed one is a 502. */
export function parseListResponse<T, L>(body: unknown, schema: ListSchema<T, L>): L {
  try {
    return decodeListJson(body, schema);
  } catch (err) {
    throw fromWireFormatError(err);
  }
}

/** Decode a single record from a response through its field table. */
export function parseRecordResponse<T>(
  body: unknown,
  type: FieldType,
  model: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  try {
    return decodeRecordJson(body, type, model);
  } catch (err) {
    throw fromWireFormatError(err);
  }
}
