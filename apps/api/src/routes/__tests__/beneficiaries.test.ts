import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  createTestApp,
  createTestUser,
  makeAuthenticatedRequest,
  readData,
  readError,
  type TestContext,
} from '../../test/helpers.js';

const BeneficiarySchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  walletNumber: z.string(),
  phone: z.string().nullable(),
  relationship: z.string().nullable(),
  beneficiaryUserId: z.string().nullable(),
});

describe('beneficiaries routes', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestApp();
  });

  async function createBeneficiary(token: string, walletNumber: string) {
    const response = await makeAuthenticatedRequest(ctx.app, 'POST', '/api/beneficiaries', token, {
      body: { name: 'Bob', email: 'BOB@example.com', walletNumber, relationship: 'Friend' },
    });
    expect(response.status).toBe(201);
    return readData(response, BeneficiarySchema);
  }

  it('creates, lists, updates and deletes the caller beneficiaries', async () => {
    const alice = await createTestUser(ctx);
    const bob = await createTestUser(ctx);

    const created = await createBeneficiary(alice.token, bob.wallet.walletNumber);
    expect(created).toMatchObject({
      name: 'Bob',
      email: 'bob@example.com',
      relationship: 'Friend',
      phone: null,
      beneficiaryUserId: bob.user.id,
    });

    const list = await makeAuthenticatedRequest(ctx.app, 'GET', '/api/beneficiaries', alice.token);
    expect(await readData(list, z.array(BeneficiarySchema))).toHaveLength(1);

    const updated = await makeAuthenticatedRequest(
      ctx.app,
      'PUT',
      `/api/beneficiaries/${created.id}`,
      alice.token,
      { body: { name: 'Robert', relationship: '' } }
    );
    expect(updated.status).toBe(200);
    expect(await readData(updated, BeneficiarySchema)).toMatchObject({
      name: 'Robert',
      relationship: null,
    });

    const deleted = await makeAuthenticatedRequest(
      ctx.app,
      'DELETE',
      `/api/beneficiaries/${created.id}`,
      alice.token
    );
    expect(deleted.status).toBe(200);

    const after = await makeAuthenticatedRequest(
      ctx.app,
      'GET',
      `/api/beneficiaries/${created.id}`,
      alice.token
    );
    expect(after.status).toBe(404);
  });

  it('returns 403 on every operation against another user beneficiary', async () => {
    const alice = await createTestUser(ctx);
    const bob = await createTestUser(ctx);
    const mallory = await createTestUser(ctx);
    const created = await createBeneficiary(alice.token, bob.wallet.walletNumber);
    const path = `/api/beneficiaries/${created.id}`;

    const responses = [
      await makeAuthenticatedRequest(ctx.app, 'GET', path, mallory.token),
      await makeAuthenticatedRequest(ctx.app, 'PUT', path, mallory.token, {
        body: { name: 'Hijacked' },
      }),
      await makeAuthenticatedRequest(ctx.app, 'DELETE', path, mallory.token),
    ];

    expect(responses.map((response) => response.status)).toEqual([403, 403, 403]);
    expect(ctx.db.beneficiaries.get(created.id)?.name).toBe('Bob');
  });

  it('keeps beneficiary lists separate per user', async () => {
    const alice = await createTestUser(ctx);
    const bob = await createTestUser(ctx);
    await createBeneficiary(alice.token, bob.wallet.walletNumber);

    const response = await makeAuthenticatedRequest(ctx.app, 'GET', '/api/beneficiaries', bob.token);

    expect(await readData(response, z.array(BeneficiarySchema))).toEqual([]);
  });

  it('rejects a non-uuid id and an empty update', async () => {
    const alice = await createTestUser(ctx);
    const bob = await createTestUser(ctx);
    const created = await createBeneficiary(alice.token, bob.wallet.walletNumber);

    const badId = await makeAuthenticatedRequest(
      ctx.app,
      'GET',
      '/api/beneficiaries/not-a-uuid',
      alice.token
    );
    const empty = await makeAuthenticatedRequest(
      ctx.app,
      'PUT',
      `/api/beneficiaries/${created.id}`,
      alice.token,
      { body: {} }
    );

    expect(badId.status).toBe(400);
    expect(empty.status).toBe(400);
    expect((await readError(empty)).issues).toEqual([
      { path: '', message: 'At least one field must be provided' },
    ]);
  });
});
