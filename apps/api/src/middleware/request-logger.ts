import { logger } from '@payflow/observability';
import type { Context, Next } from 'hono';
import type { AppBindings } from '../types/context.js';

/**
 * One log line per request, written after the response status is known
 */
export async function requestLoggerMiddleware(c: Context<AppBindings>, next: Next) {
  const startedAt = performance.now();

  await next();

  const status = c.res.status;
  const entry = {
    requestId: c.get('requestId'),
    method: c.req.method,
    path: c.req.path,
    status,
    durationMs: Math.round((performance.now() - startedAt) * 100) / 100,
    ...(c.get('auth') && { userId: c.get('userId') }),
  };

  if (status >= 500) {
    logger.error(entry, 'Request failed');
  } else {
    logger.info(entry, 'Request completed');
  }
}
