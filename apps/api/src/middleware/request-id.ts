import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';
import type { AppBindings } from '../types/context.js';

const MAX_INBOUND_ID_LENGTH = 128;

/**
 * Request ID middleware
 * Reuses an upstream id (load balancer, gateway) when present, otherwise
 * generates one. Echoed back in x-request-id for client correlation.
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  const inbound = c.req.header('x-request-id') || c.req.header('x-correlation-id');
  const requestId =
    inbound && inbound.length <= MAX_INBOUND_ID_LENGTH ? inbound : randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
