import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ApiError, WireFormatError } from '../errors.js';
import type { LogCallback } from '../middleware/logger.js';

/**
 * Shared route error handler - maps ApiError and WireFormatError to
 * their structured JSON responses and anything else to a 500.
 *
 * Installed as the app's `onError`, so routes throw instead of catching.
 */
export function createErrorHandler(log: LogCallback) {
  return (err: Error, c: Context): Response => {
    const apiError = toApiError(err);
    const requestId = c.get('requestId');
    if (apiError) {
      if (apiError.status >= 500) {
        log('error', { event: 'request_failed', request_id: requestId, message: apiError.message });
      }
      return c.json(
        { ...apiError.body, ...(requestId ? { request_id: requestId } : {}) },
        isContentfulStatus(apiError.status) ? apiError.status : 500,
      );
    }

    log('error', {
      event: 'unhandled_error',
      request_id: requestId,
      message: err.message,
      stack: err.stack,
    });
    return c.json(
      {
        error: 'internal_error',
        message: 'Internal server error',
        ...(requestId ? { request_id: requestId } : {}),
      },
      500,
    );
  };
}

export function toApiError(err: unknown): ApiError | null {
  if (ApiError.isApiError(err)) return err;
  if (err instanceof WireFormatError) return err.toApiError();
  return null;
}

function isContentfulStatus(status: number): status is ContentfulStatusCode {
  return (
    Number.isInteger(status) &&
    status >= 200 &&
    status < 600 &&
    status !== 204 &&
    status !== 205 &&
    status !== 304
  );
}
