/**
 * Hono ContextVariableMap augmentation - typed c.set()/c.get() for the
 * variables the middleware stack provides.
 */
declare module 'hono' {
  interface ContextVariableMap {
    /** Unique request identifier (set by request-id middleware). */
    requestId: string;
    /** OTEL trace ID for log-trace correlation (set by tracing middleware). */
    traceId: string;
  }
}

export {};
