import { ApiError, type ApiErrorBody } from '../errors.js';
import type { LogCallback } from '../middleware/logger.js';
import type { CircuitState } from '../types.js';

export interface ClusterManagerClientOptions {
  /** Per-request timeout. Default 10s. */
  timeoutMs?: number;
  /** Consecutive failures that open the circuit. Default 5. */
  maxFailures?: number;
  /** Failures older than this no longer count. Default 30s. */
  windowMs?: number;
  /** Time the circuit stays open before a half-open probe. Default 10s. */
  cooldownMs?: number;
  /** Extra headers sent on every request (e.g. Authorization). */
  headers?: Record<string, string>;
  log?: LogCallback;
}

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string | undefined>;
}

/**
 * Typed HTTP client for one version of the cluster manager API.
 *
 * `baseUrl` includes the version segment, e.g.
 * `http://cm.example.com:7180/api/v14`. Non-2xx responses reject with an
 * ApiError carrying the server's status and body. Only 5xx responses and
 * transport failures count toward the circuit breaker; 4xx are the
 * caller's problem.
 */
export class ClusterManagerClient {
  readonly baseUrl: string;
  private circuitState: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureAt = 0;
  private readonly timeoutMs: number;
  private readonly maxFailures: number;
  private readonly windowMs: number;
  private readonly cooldownMs: number;
  private readonly headers: Record<string, string>;
  private readonly log: LogCallback | null;

  constructor(baseUrl: string, opts: ClusterManagerClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.maxFailures = opts.maxFailures ?? 5;
    this.windowMs = opts.windowMs ?? 30_000;
    this.cooldownMs = opts.cooldownMs ?? 10_000;
    this.headers = opts.headers ?? {};
    this.log = opts.log ?? null;
  }

  get circuit(): CircuitState {
    return this.circuitState;
  }

  get(path: string, opts?: RequestOptions): Promise<unknown> {
    return this.request('GET', path, opts);
  }

  post(path: string, body: unknown): Promise<unknown> {
    return this.request('POST', path, { body });
  }

  put(path: string, body: unknown): Promise<unknown> {
    return this.request('PUT', path, { body });
  }

  delete(path: string): Promise<unknown> {
    return this.request('DELETE', path);
  }

  /**
   * Send a JSON request and return the parsed JSON response. The result
   * is unvalidated; the endpoint functions decode it through the models.
   */
  async request(method: string, path: string, opts: RequestOptions = {}): Promise<unknown> {
    this.checkCircuit();

    const url = this.buildUrl(path, opts.query);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(url, {
        method,
        headers: {
          Accept: 'application/json',
          ...(opts.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
          ...this.headers,
        },
        body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
        signal: controller.signal,
      });
    } catch (err) {
      this.recordFailure();
      throw new ApiError(503, {
        error: 'upstream_unreachable',
        message: `${method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok) {
      if (res.status >= 500) this.recordFailure();
      throw new ApiError(res.status, await readErrorBody(res));
    }

    this.recordSuccess();
    const text = await res.text();
    if (!text) return undefined;
    try {
      return JSON.parse(text);
    } catch {
      throw new ApiError(502, {
        error: 'invalid_response',
        message: `${method} ${url} returned a non-JSON body`,
      });
    }
  }

  private buildUrl(path: string, query?: Record<string, string | undefined>): string {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private transitionTo(next: CircuitState): void {
    const from = this.circuitState;
    if (from === next) return;
    this.circuitState = next;
    this.log?.(next === 'open' ? 'error' : next === 'half-open' ? 'warn' : 'info', {
      event: 'circuit_breaker_transition',
      from,
      to: next,
      consecutive_failures: this.consecutiveFailures,
      upstream: this.baseUrl,
    });
  }

  private checkCircuit(): void {
    if (this.circuitState !== 'open') return;
    if (Date.now() - this.lastFailureAt >= this.cooldownMs) {
      this.transitionTo('half-open');
      return;
    }
    throw new ApiError(503, {
      error: 'circuit_open',
      message: 'Cluster manager temporarily unavailable (circuit breaker open)',
    });
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.transitionTo('closed');
  }

  private recordFailure(): void {
    const now = Date.now();
    if (now - this.lastFailureAt > this.windowMs) {
      this.consecutiveFailures = 0;
    }
    this.consecutiveFailures++;
    this.lastFailureAt = now;
    if (this.circuitState === 'half-open' || this.consecutiveFailures >= this.maxFailures) {
      this.transitionTo('open');
    }
  }
}

async function readErrorBody(res: Response): Promise<ApiErrorBody> {
  const fallback: ApiErrorBody = { error: 'http_error', message: `HTTP ${res.status}` };
  const text = await res.text().catch(() => '');
  if (!text) return fallback;
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && 'message' in parsed) {
      const { error, message } = parsed;
      if (typeof error === 'string' && typeof message === 'string') {
        return { ...parsed, error, message };
      }
    }
  } catch {
    return { ...fallback, message: text.slice(0, 200) };
  }
  return fallback;
}
