/**
 * ApiError - Structured HTTP error for the cluster manager API.
 *
 * Extends native Error so stack traces survive into logs, while carrying
 * the HTTP `status` and the `{ error, message }` body returned to callers.
 * Thrown by services on the server side and by the typed client when a
 * response is not 2xx.
 */
import type { ErrorResponse } from './types.js';

/**
 * Error body that may carry extra diagnostic fields beyond ErrorResponse.
 */
export type ApiErrorBody = ErrorResponse & Record<string, unknown>;

export class ApiError extends Error {
  readonly status: number;
  readonly body: ApiErrorBody;

  /**
   * @param status - HTTP status code (e.g., 400, 404, 409, 503)
   * @param body - Structured error body with `error` and `message` fields
   */
  constructor(status: number, body: ApiErrorBody) {
    super(`ApiError(${status}): ${body.message}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;

    // Keep instanceof working when extending built-ins
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  override toString(): string {
    return `ApiError(${this.status}): ${this.body.error} - ${this.body.message}`;
  }

  static isApiError(err: unknown): err is ApiError {
    return err instanceof ApiError;
  }

  static notFound(message: string): ApiError {
    return new ApiError(404, { error: 'not_found', message });
  }

  static invalidRequest(message: string): ApiError {
    return new ApiError(400, { error: 'invalid_request', message });
  }

  static conflict(message: string): ApiError {
    return new ApiError(409, { error: 'conflict', message });
  }

  static unavailable(error: string, message: string): ApiError {
    return new ApiError(503, { error, message });
  }
}

/**
 * Raised by the JSON and XML codecs when a payload does not match the
 * declared wire schema.
 */
export class WireFormatError extends Error {
  readonly format: 'json' | 'xml';

  constructor(format: 'json' | 'xml', message: string) {
    super(message);
    this.name = 'WireFormatError';
    this.format = format;
    Object.setPrototypeOf(this, WireFormatError.prototype);
  }

  /** Convert to the 400 response the routes return for malformed bodies. */
  toApiError(): ApiError {
    return new ApiError(400, {
      error: 'invalid_request',
      message: `Malformed ${this.format.toUpperCase()} body: ${this.message}`,
    });
  }
}
