import { zValidator } from '@hono/zod-validator';
import { toMinorUnits } from '@payflow/core';
import { AddFundsSchema } from '@payflow/types';
import { Hono } from 'hono';
import { throwOnInvalid } from '../lib/errors.js';
import { success } from '../lib/responses.js';
import { authMiddleware } from '../middleware/auth.js';
import { requireCapability } from '../middleware/capabilities.js';
import type { AppBindings } from '../types/context.js';

const walletRoute = new Hono<AppBindings>();

walletRoute.use('*', authMiddleware);

walletRoute.get('/', requireCapability('wallet:read'), async (c) => {
  const wallet = await c.get('services').wallets.getWallet(c.get('userId'));
  return c.json(success(wallet));
});

/**
 * POST /api/wallet/add-funds - Credit the caller's own wallet
 * Amount arrives in major units and is converted to cents here
 */
walletRoute.post(
  '/add-funds',
  requireCapability('wallet:fund'),
  zValidator('json', AddFundsSchema, throwOnInvalid),
  async (c) => {
    const amountMinor = toMinorUnits(c.req.valid('json').amount);
    const result = await c.get('services').wallets.addFunds(c.get('userId'), amountMinor);
    return c.json(success(result));
  }
);

export { walletRoute };
