import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Tags every request with an X-Request-Id, echoed on the response.
 * A caller-supplied id is kept when it is short enough to log safely.
 */
export const requestId = () =>
  createMiddleware(async (c, next) => {
    const incoming = c.req.header('x-request-id');
    const id = incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : randomUUID();
    c.set('requestId', id);
    c.header('X-Request-Id', id);
    await next();
  });
