/**
 * Admin reporting
 *
 * Read-only listings and statistics (admin:read). The only write is
 * PATCH /users/:id (admin:write), limited to account status and role.
 */

import { zValidator } from '@hono/zod-validator';
import {
  AdminListTransactionsQuerySchema,
  AdminListUsersQuerySchema,
  AdminListWalletsQuerySchema,
  AdminStatsQuerySchema,
  AdminUpdateUserSchema,
  UuidParamSchema,
} from '@payflow/types';
import { Hono } from 'hono';
import { resolveClientIp } from '../lib/client-ip.js';
import { throwOnInvalid } from '../lib/errors.js';
import { success } from '../lib/responses.js';
import { authMiddleware } from '../middleware/auth.js';
import { requireCapability } from '../middleware/capabilities.js';
import type { AppBindings } from '../types/context.js';

const adminRoute = new Hono<AppBindings>();

adminRoute.use('*', authMiddleware);

adminRoute.get(
  '/users',
  requireCapability('admin:read'),
  zValidator('query', AdminListUsersQuerySchema, throwOnInvalid),
  async (c) => {
    const page = await c.get('services').admin.listUsers(c.req.valid('query'));
    return c.json(success(page));
  }
);

adminRoute.get(
  '/users/:id',
  requireCapability('admin:read'),
  zValidator('param', UuidParamSchema, throwOnInvalid),
  async (c) => {
    const user = await c.get('services').admin.getUserDetail(c.req.valid('param').id);
    return c.json(success(user));
  }
);

adminRoute.get(
  '/wallets',
  requireCapability('admin:read'),
  zValidator('query', AdminListWalletsQuerySchema, throwOnInvalid),
  async (c) => {
    const wallets = await c.get('services').admin.listWallets(c.req.valid('query'));
    return c.json(success(wallets));
  }
);

adminRoute.get(
  '/stats',
  requireCapability('admin:read'),
  zValidator('query', AdminStatsQuerySchema, throwOnInvalid),
  async (c) => {
    const stats = await c.get('services').admin.getStats(c.req.valid('query').period);
    return c.json(success(stats));
  }
);

adminRoute.get(
  '/transactions',
  requireCapability('admin:read'),
  zValidator('query', AdminListTransactionsQuerySchema, throwOnInvalid),
  async (c) => {
    const page = await c.get('services').admin.listTransactions(c.req.valid('query'));
    return c.json(success(page));
  }
);

adminRoute.patch(
  '/users/:id',
  requireCapability('admin:write'),
  zValidator('param', UuidParamSchema, throwOnInvalid),
  zValidator('json', AdminUpdateUserSchema, throwOnInvalid),
  async (c) => {
    const { status, role } = c.req.valid('json');
    const user = await c.get('services').admin.updateUser({
      actorId: c.get('userId'),
      targetId: c.req.valid('param').id,
      status,
      role,
      ip: resolveClientIp(c),
    });
    return c.json(success(user));
  }
);

export { adminRoute };
