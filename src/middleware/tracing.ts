import { createMiddleware } from 'hono/factory';
import { context, propagation, SpanStatusCode, trace } from '@opentelemetry/api';

/**
 * Request tracing - W3C traceparent propagation plus one span per request.
 *
 * Incoming `traceparent`/`tracestate` become the parent context. The
 * span's own ids are echoed as `traceparent` and `x-trace-id` so logs can
 * be joined to traces. Without a registered SDK the API hands out no-op
 * spans and the ids are all zeros.
 */
export function createTracing(serviceName: string) {
  const tracer = trace.getTracer(serviceName);

  return createMiddleware(async (c, next) => {
    const carrier: Record<string, string> = {};
    const incoming = c.req.header('traceparent');
    if (incoming) carrier['traceparent'] = incoming;
    const tracestate = c.req.header('tracestate');
    if (tracestate) carrier['tracestate'] = tracestate;
    const parentCtx = propagation.extract(context.active(), carrier);

    await tracer.startActiveSpan(
      `${c.req.method} ${c.req.path}`,
      { attributes: { 'http.method': c.req.method, 'http.route': c.req.path } },
      parentCtx,
      async (span) => {
        const ctx = span.spanContext();
        const flags = ctx.traceFlags.toString(16).padStart(2, '0');
        c.header('traceparent', `00-${ctx.traceId}-${ctx.spanId}-${flags}`);
        c.header('x-trace-id', ctx.traceId);
        c.set('traceId', ctx.traceId);

        try {
          await next();
          span.setAttribute('http.status_code', c.res.status);
          if (c.res.status >= 500) {
            span.setStatus({ code: SpanStatusCode.ERROR });
          }
        } finally {
          span.end();
        }
      },
    );
  });
}
