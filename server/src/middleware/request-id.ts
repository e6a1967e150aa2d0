import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import { createRunLogger, type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

/**
 * Accepts a caller-supplied `X-Request-ID` when it is short and safe,
 * otherwise mints one. The id doubles as the tailoring run id, so the
 * request logger and every pipeline log line share it.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const candidate = c.req.header('X-Request-ID')?.trim().slice(0, 64);
  const requestId = candidate && REQUEST_ID_RE.test(candidate) ? candidate : randomUUID();
  c.set('requestId', requestId);
  c.set('log', createRunLogger(requestId, { path: c.req.path }));
  c.header('X-Request-ID', requestId);
  await next();
}
