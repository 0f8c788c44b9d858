import { Hono } from 'hono';
import { success } from '../lib/responses.js';
import type { AppBindings } from '../types/context.js';

export const API_VERSION = '0.1.0';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', (c) => {
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: API_VERSION,
  };

  return c.json(success(response));
});

export { healthRoute };
