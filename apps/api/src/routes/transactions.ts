/**
 * Transfers and transaction history
 *
 * - POST /api/transactions/send: transfers:send
 * - GET /api/transactions: transactions:read
 * - GET /api/transactions/:reference: transactions:read, caller must be a party
 */

import { zValidator } from '@hono/zod-validator';
import { presentWallet, toMinorUnits } from '@payflow/core';
import {
  ListTransactionsQuerySchema,
  SendMoneySchema,
  TransactionReferenceParamSchema,
} from '@payflow/types';
import { Hono } from 'hono';
import { RequestValidationError, throwOnInvalid } from '../lib/errors.js';
import { success } from '../lib/responses.js';
import { authMiddleware } from '../middleware/auth.js';
import { requireCapability } from '../middleware/capabilities.js';
import type { AppBindings } from '../types/context.js';

const transactionsRoute = new Hono<AppBindings>();

transactionsRoute.use('*', authMiddleware);

transactionsRoute.post(
  '/send',
  requireCapability('transfers:send'),
  zValidator('json', SendMoneySchema, throwOnInvalid),
  async (c) => {
    const services = c.get('services');
    const senderId = c.get('userId');
    const body = c.req.valid('json');

    const amountMinor = toMinorUnits(body.amount);
    const receiverId = body.walletNumber
      ? await services.wallets.resolveWalletOwner(body.walletNumber)
      : body.receiverId;
    if (!receiverId) {
      throw new RequestValidationError([
        { path: 'receiverId', message: 'Provide exactly one of receiverId or walletNumber' },
      ]);
    }

    const result = await services.transfers.transfer({
      senderId,
      receiverId,
      amountMinor,
      note: body.note ?? null,
    });
    const transaction = await services.transactions.getTransaction(
      senderId,
      result.transaction.reference
    );

    return c.json(
      success({
        transaction,
        wallet: presentWallet(result.senderWallet),
      }),
      201
    );
  }
);

transactionsRoute.get(
  '/',
  requireCapability('transactions:read'),
  zValidator('query', ListTransactionsQuerySchema, throwOnInvalid),
  async (c) => {
    const page = await c
      .get('services')
      .transactions.listTransactions(c.get('userId'), c.req.valid('query'));
    return c.json(success(page));
  }
);

transactionsRoute.get(
  '/:reference',
  requireCapability('transactions:read'),
  zValidator('param', TransactionReferenceParamSchema, throwOnInvalid),
  async (c) => {
    const { reference } = c.req.valid('param');
    const transaction = await c
      .get('services')
      .transactions.getTransaction(c.get('userId'), reference);
    return c.json(success(transaction));
  }
);

export { transactionsRoute };
