import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]{1,64}$/;

/**
 * Echoes a caller-supplied X-Request-ID when it is safe to log, otherwise
 * mints a fresh one.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const supplied = c.req.header('X-Request-ID')?.trim();
  const requestId = supplied && REQUEST_ID_RE.test(supplied) ? supplied : randomUUID();
  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);
  await next();
}
