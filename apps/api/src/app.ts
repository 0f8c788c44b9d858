import { Hono } from 'hono';
import type { ApiConfig } from './config.js';
import { handleError, handleNotFound } from './lib/errors.js';
import { createCorsMiddleware } from './middleware/cors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLoggerMiddleware } from './middleware/request-logger.js';
import { adminRoute } from './routes/admin.js';
import { authRoute } from './routes/auth.js';
import { beneficiariesRoute } from './routes/beneficiaries.js';
import { healthRoute } from './routes/health.js';
import { notificationsRoute } from './routes/notifications.js';
import { transactionsRoute } from './routes/transactions.js';
import { usersRoute } from './routes/users.js';
import { walletRoute } from './routes/wallet.js';
import type { Services } from './services/index.js';
import type { AppBindings } from './types/context.js';

/**
 * Build the HTTP app around a set of services.
 * The server entry passes database-backed services; tests pass in-memory ones.
 */
export function createApp(services: Services, config: ApiConfig) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    c.set('services', services);
    c.set('config', config);
    c.set('auth', null);
    await next();
  });

  app.use('*', requestLoggerMiddleware);
  app.use('*', createCorsMiddleware(config.corsOrigins, config.nodeEnv !== 'production'));

  const api = new Hono<AppBindings>();
  api.route('/health', healthRoute);
  api.route('/auth', authRoute);
  api.route('/users', usersRoute);
  api.route('/wallet', walletRoute);
  api.route('/transactions', transactionsRoute);
  api.route('/beneficiaries', beneficiariesRoute);
  api.route('/notifications', notificationsRoute);
  api.route('/admin', adminRoute);

  app.route('/api', api);

  app.notFound(handleNotFound);
  app.onError(handleError);

  return app;
}

export type App = ReturnType<typeof createApp>;
