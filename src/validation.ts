/**
 * Input validation for resource names.
 *
 * Cluster, service and group names are interpolated into store keys and
 * log lines; reject anything outside a conservative character set. Names
 * accepted in request bodies follow the same rule as path parameters, so
 * whatever is created can be addressed again.
 */
import type { Context } from 'hono';
import { z } from 'zod';
import { ApiError } from './errors.js';

const PATH_PARAM_RE = /^[a-zA-Z0-9_.-]+$/;

/**
 * Validate a value is safe to use as a resource name.
 * Rejects `.`/`..`, separators and special characters.
 */
export function isValidPathParam(value: string): boolean {
  return (
    PATH_PARAM_RE.test(value) &&
    value !== '.' &&
    value !== '..' &&
    value.length > 0 &&
    value.length <= 128
  );
}

/** Read a path parameter, throwing a 400 ApiError when it is not a valid name. */
export function requirePathParam(c: Context, name: string): string {
  const value = c.req.param(name) ?? '';
  if (!isValidPathParam(value)) {
    throw ApiError.invalidRequest(`Invalid ${name} format`);
  }
  return value;
}

/** Zod schema for a name that will later appear in a URL path. */
export const ResourceNameSchema = z
  .string()
  .refine(isValidPathParam, { message: 'Invalid name format' });
