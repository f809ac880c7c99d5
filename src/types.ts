/**
 * Shared response shapes for the cluster manager API.
 *
 * Resource models (clusters, role config groups, roles, configs) live in
 * `model/`; this module holds the cross-cutting HTTP shapes.
 */

/** Error response shape */
export interface ErrorResponse {
  error: string;
  message: string;
  request_id?: string;
}

/** Health status for an individual dependency */
export interface ServiceHealth {
  status: 'healthy' | 'degraded' | 'unreachable';
  latency_ms?: number;
  error?: string;
}

/** Circuit breaker states used by the typed client */
export type CircuitState = 'closed' | 'open' | 'half-open';

/** Wire formats the list envelopes support. */
export type WireFormat = 'json' | 'xml';
