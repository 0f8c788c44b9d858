import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import {
  TransactionViewSchema,
  createTestApp,
  createTestUser,
  makeAuthenticatedRequest,
  readData,
  readError,
  type TestContext,
} from '../../test/helpers.js';

const AdminUserSchema = z.object({
  id: z.string(),
  email: z.string(),
  role: z.string(),
  status: z.string(),
  wallet: z.object({ balance: z.number() }).nullable(),
  sentCount: z.number(),
  receivedCount: z.number(),
});

const StatsSchema = z.object({
  period: z.string(),
  since: z.string().nullable(),
  users: z.object({ total: z.number(), active: z.number(), admins: z.number() }),
  transactions: z.object({ total: z.number(), transfers: z.number(), deposits: z.number() }),
  revenue: z.number(),
  transferVolume: z.number(),
  depositVolume: z.number(),
  wallets: z.object({ total: z.number(), totalBalance: z.number() }),
  trend: z.array(z.object({ date: z.string(), count: z.number(), volume: z.number() })),
});

describe('admin routes', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestApp();
  });

  it('returns 403 to a regular user and records the denial', async () => {
    const { user, token } = await createTestUser(ctx);
    const emit = vi.spyOn(ctx.authEvents, 'emit');

    const response = await makeAuthenticatedRequest(ctx.app, 'GET', '/api/admin/users', token);

    expect(response.status).toBe(403);
    expect(await readError(response)).toEqual({
      code: 'forbidden',
      message: 'Missing capability: admin:read',
    });
    expect(emit).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'token.capability_denied',
        userId: user.id,
        metadata: expect.objectContaining({
          endpoint: '/api/admin/users',
          method: 'GET',
          requiredCapabilities: ['admin:read'],
          role: 'user',
        }),
      })
    );
  });

  it('lists users with wallet snapshots and transfer counts', async () => {
    const admin = await createTestUser(ctx, { role: 'admin' });
    const alice = await createTestUser(ctx, { email: 'alice@example.com', balanceMinor: 10_000 });
    const bob = await createTestUser(ctx, { email: 'bob@example.com' });
    await ctx.services.transfers.transfer({
      senderId: alice.user.id,
      receiverId: bob.user.id,
      amountMinor: 1000,
    });

    const response = await makeAuthenticatedRequest(
      ctx.app,
      'GET',
      '/api/admin/users?search=ALICE',
      admin.token
    );

    expect(response.status).toBe(200);
    const page = await readData(
      response,
      z.object({ items: z.array(AdminUserSchema), total: z.number() })
    );
    expect(page.total).toBe(1);
    expect(page.items[0]).toMatchObject({
      id: alice.user.id,
      wallet: { balance: 89.95 },
      sentCount: 1,
      receivedCount: 0,
    });
  });

  it('reports platform statistics for a period', async () => {
    const admin = await createTestUser(ctx, { role: 'admin' });
    const alice = await createTestUser(ctx);
    const bob = await createTestUser(ctx);
    await ctx.services.wallets.addFunds(alice.user.id, 10_000);
    await ctx.services.transfers.transfer({
      senderId: alice.user.id,
      receiverId: bob.user.id,
      amountMinor: 1000,
    });

    const response = await makeAuthenticatedRequest(
      ctx.app,
      'GET',
      '/api/admin/stats?period=all',
      admin.token
    );

    expect(response.status).toBe(200);
    const stats = await readData(response, StatsSchema);
    expect(stats).toMatchObject({
      period: 'all',
      since: null,
      users: { total: 3, active: 3, admins: 1 },
      transactions: { total: 2, transfers: 1, deposits: 1 },
      revenue: 0.05,
      transferVolume: 10,
      depositVolume: 100,
      wallets: { total: 3, totalBalance: 99.95 },
    });
    expect(stats.trend).toHaveLength(7);
    expect(stats.trend.reduce((sum, day) => sum + day.count, 0)).toBe(1);
  });

  it('rejects an unknown stats period', async () => {
    const admin = await createTestUser(ctx, { role: 'admin' });

    const response = await makeAuthenticatedRequest(
      ctx.app,
      'GET',
      '/api/admin/stats?period=decade',
      admin.token
    );

    expect(response.status).toBe(400);
  });

  it('filters platform transactions by type', async () => {
    const admin = await createTestUser(ctx, { role: 'admin' });
    const alice = await createTestUser(ctx);
    const bob = await createTestUser(ctx);
    await ctx.services.wallets.addFunds(alice.user.id, 5000);
    await ctx.services.transfers.transfer({
      senderId: alice.user.id,
      receiverId: bob.user.id,
      amountMinor: 1000,
    });

    const response = await makeAuthenticatedRequest(
      ctx.app,
      'GET',
      '/api/admin/transactions?type=deposit',
      admin.token
    );

    const page = await readData(
      response,
      z.object({ items: z.array(TransactionViewSchema), total: z.number() })
    );
    expect(page.total).toBe(1);
    expect(page.items[0]).toMatchObject({ type: 'deposit', amount: 50, direction: 'deposit' });
  });

  describe('GET /api/admin/users/:id', () => {
    const DetailSchema = AdminUserSchema.extend({
      recentTransactions: z.object({
        sent: z.array(TransactionViewSchema),
        received: z.array(TransactionViewSchema),
      }),
    });

    it('returns the user with wallet and recent transfers in each direction', async () => {
      const admin = await createTestUser(ctx, { role: 'admin' });
      const alice = await createTestUser(ctx, { balanceMinor: 10_000 });
      const bob = await createTestUser(ctx, { balanceMinor: 5000 });
      await ctx.services.wallets.addFunds(alice.user.id, 1000);
      await ctx.services.transfers.transfer({
        senderId: alice.user.id,
        receiverId: bob.user.id,
        amountMinor: 1000,
      });
      await ctx.services.transfers.transfer({
        senderId: bob.user.id,
        receiverId: alice.user.id,
        amountMinor: 2000,
      });

      const response = await makeAuthenticatedRequest(
        ctx.app,
        'GET',
        `/api/admin/users/${alice.user.id}`,
        admin.token
      );

      expect(response.status).toBe(200);
      const detail = await readData(response, DetailSchema);
      expect(detail).toMatchObject({
        id: alice.user.id,
        wallet: { balance: 119.95 },
        sentCount: 1,
        receivedCount: 1,
      });
      expect(detail.recentTransactions.sent.map((item) => [item.direction, item.amount])).toEqual([
        ['sent', 10],
      ]);
      expect(
        detail.recentTransactions.received.map((item) => [item.direction, item.amount])
      ).toEqual([['received', 20]]);
    });

    it('returns 404 for an unknown user and 400 for a malformed id', async () => {
      const admin = await createTestUser(ctx, { role: 'admin' });

      const unknown = await makeAuthenticatedRequest(
        ctx.app,
        'GET',
        '/api/admin/users/00000000-0000-4000-8000-000000000000',
        admin.token
      );
      const malformed = await makeAuthenticatedRequest(
        ctx.app,
        'GET',
        '/api/admin/users/not-a-uuid',
        admin.token
      );

      expect(unknown.status).toBe(404);
      expect(malformed.status).toBe(400);
    });
  });

  describe('GET /api/admin/wallets', () => {
    const WalletPageSchema = z.object({
      items: z.array(
        z.object({
          walletNumber: z.string(),
          balance: z.number(),
          status: z.string(),
          owner: z.object({
            id: z.string(),
            name: z.string(),
            email: z.string(),
            status: z.string(),
          }),
          totals: z.object({ sent: z.number(), received: z.number() }),
        })
      ),
      total: z.number(),
      statistics: z.object({
        totalBalance: z.number(),
        activeWallets: z.number(),
        averageBalance: z.number(),
      }),
    });

    let admin: Awaited<ReturnType<typeof createTestUser>>;
    let alice: Awaited<ReturnType<typeof createTestUser>>;
    let bob: Awaited<ReturnType<typeof createTestUser>>;
    let carol: Awaited<ReturnType<typeof createTestUser>>;

    beforeEach(async () => {
      admin = await createTestUser(ctx, { role: 'admin' });
      alice = await createTestUser(ctx, {
        firstName: 'Alice',
        lastName: 'Adams',
        email: 'alice@example.com',
        balanceMinor: 10_000,
      });
      bob = await createTestUser(ctx, { email: 'bob@example.com' });
      carol = await createTestUser(ctx, { balanceMinor: 500, walletStatus: 'frozen' });
      await ctx.services.transfers.transfer({
        senderId: alice.user.id,
        receiverId: bob.user.id,
        amountMinor: 1000,
      });
    });

    it('lists wallets with owner, transfer totals and platform statistics', async () => {
      const response = await makeAuthenticatedRequest(
        ctx.app,
        'GET',
        '/api/admin/wallets?search=alice@example.com',
        admin.token
      );

      expect(response.status).toBe(200);
      const page = await readData(response, WalletPageSchema);
      expect(page.total).toBe(1);
      expect(page.items[0]).toMatchObject({
        walletNumber: alice.wallet.walletNumber,
        balance: 89.95,
        owner: {
          id: alice.user.id,
          name: 'Alice Adams',
          email: 'alice@example.com',
          status: 'active',
        },
        totals: { sent: 10.05, received: 0 },
      });
      // 0 + 8995 + 1000 + 500 cents over four wallets
      expect(page.statistics).toEqual({
        totalBalance: 104.95,
        activeWallets: 3,
        averageBalance: 26.24,
      });
    });

    it('matches wallet numbers and filters by status', async () => {
      const byNumber = await readData(
        await makeAuthenticatedRequest(
          ctx.app,
          'GET',
          `/api/admin/wallets?search=${bob.wallet.walletNumber}`,
          admin.token
        ),
        WalletPageSchema
      );
      const frozen = await readData(
        await makeAuthenticatedRequest(
          ctx.app,
          'GET',
          '/api/admin/wallets?status=frozen',
          admin.token
        ),
        WalletPageSchema
      );

      expect(byNumber.items.map((item) => [item.owner.id, item.totals])).toEqual([
        [bob.user.id, { sent: 0, received: 10 }],
      ]);
      expect(frozen.items.map((item) => item.owner.id)).toEqual([carol.user.id]);
    });

    it('rejects an unknown wallet status', async () => {
      const response = await makeAuthenticatedRequest(
        ctx.app,
        'GET',
        '/api/admin/wallets?status=closed',
        admin.token
      );

      expect(response.status).toBe(400);
    });
  });

  describe('PATCH /api/admin/users/:id', () => {
    it('suspends another user, who is then locked out', async () => {
      const admin = await createTestUser(ctx, { role: 'admin' });
      const target = await createTestUser(ctx);

      const response = await makeAuthenticatedRequest(
        ctx.app,
        'PATCH',
        `/api/admin/users/${target.user.id}`,
        admin.token,
        { body: { status: 'suspended' } }
      );

      expect(response.status).toBe(200);
      expect(await readData(response, z.object({ status: z.string() }))).toEqual({
        status: 'suspended',
      });

      const locked = await makeAuthenticatedRequest(ctx.app, 'GET', '/api/wallet', target.token);
      expect(locked.status).toBe(403);
    });

    it('refuses to let an admin change their own account', async () => {
      const admin = await createTestUser(ctx, { role: 'admin' });

      const response = await makeAuthenticatedRequest(
        ctx.app,
        'PATCH',
        `/api/admin/users/${admin.user.id}`,
        admin.token,
        { body: { role: 'user' } }
      );

      expect(response.status).toBe(403);
      expect(await readError(response)).toEqual({
        code: 'forbidden',
        message: 'Admins cannot change their own role or status',
      });
    });

    it('rejects fields other than status and role', async () => {
      const admin = await createTestUser(ctx, { role: 'admin' });
      const target = await createTestUser(ctx);

      const response = await makeAuthenticatedRequest(
        ctx.app,
        'PATCH',
        `/api/admin/users/${target.user.id}`,
        admin.token,
        { body: { status: 'active', balance: 1_000_000 } }
      );

      expect(response.status).toBe(400);
    });

    it('returns 404 for an unknown user', async () => {
      const admin = await createTestUser(ctx, { role: 'admin' });

      const response = await makeAuthenticatedRequest(
        ctx.app,
        'PATCH',
        '/api/admin/users/00000000-0000-4000-8000-000000000000',
        admin.token,
        { body: { status: 'suspended' } }
      );

      expect(response.status).toBe(404);
    });
  });
});
