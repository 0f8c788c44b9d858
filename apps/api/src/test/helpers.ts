/**
 * HTTP test helpers
 * Builds the real app around in-memory services and drives it through app.fetch
 */

import { AuthEventEmitter, hashPassword, signAccessToken } from '@payflow/auth';
import { DomainEventEmitter } from '@payflow/core';
import {
  InMemoryAdminRepository,
  InMemoryBeneficiaryRepository,
  InMemoryDatabase,
  InMemoryLedgerStore,
  InMemoryNotificationRepository,
  InMemoryProfileRepository,
  InMemoryTransactionRepository,
  InMemoryUserRepository,
  InMemoryWalletRepository,
  seedUser,
  type SeedUserOptions,
  type SeededUser,
} from '@payflow/core/testing';
import type { Env, Hono } from 'hono';
import { z } from 'zod';
import { createApp } from '../app.js';
import type { ApiConfig } from '../config.js';
import { createServices, type Repositories } from '../services/index.js';

export const TEST_PASSWORD = 'test-password-1';

export const TEST_CONFIG: ApiConfig = {
  nodeEnv: 'test',
  port: 0,
  databaseUrl: null,
  corsOrigins: ['http://localhost:5173'],
  trustedProxyIps: [],
  accessToken: {
    secret: 'test-secret-value-that-is-at-least-32-chars',
    issuer: 'payflow-api',
    audience: 'payflow-clients',
    ttlSeconds: 3600,
  },
  logLevel: 'silent',
};

export function createTestApp(overrides: Partial<ApiConfig> = {}) {
  const db = new InMemoryDatabase();
  const authEvents = new AuthEventEmitter();
  const domainEvents = new DomainEventEmitter();
  const repos: Repositories = {
    users: new InMemoryUserRepository(db),
    profiles: new InMemoryProfileRepository(db),
    wallets: new InMemoryWalletRepository(db),
    transactions: new InMemoryTransactionRepository(db),
    beneficiaries: new InMemoryBeneficiaryRepository(db),
    notifications: new InMemoryNotificationRepository(db),
    admin: new InMemoryAdminRepository(db),
    ledger: new InMemoryLedgerStore(db),
  };
  const services = createServices(repos, { authEvents, domainEvents });
  const config: ApiConfig = { ...TEST_CONFIG, ...overrides };

  return {
    app: createApp(services, config),
    db,
    services,
    config,
    authEvents,
    domainEvents,
  };
}

export type TestContext = ReturnType<typeof createTestApp>;

export async function createAccessToken(userId: string, config: ApiConfig = TEST_CONFIG) {
  const issued = await signAccessToken(config.accessToken, { userId });
  return issued.token;
}

/**
 * Seed a user that can log in with TEST_PASSWORD, plus a token for it
 */
export async function createTestUser(
  ctx: TestContext,
  options: SeedUserOptions = {}
): Promise<SeededUser & { token: string }> {
  const seeded = seedUser(ctx.db, {
    passwordHash: await hashPassword(TEST_PASSWORD),
    ...options,
  });
  const token = await createAccessToken(seeded.user.id, ctx.config);
  return { ...seeded, token };
}

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 *
 * @param path - Request path (e.g., '/api/wallet')
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  return app.fetch(new Request(`http://localhost${path}`, init));
}

/**
 * Make an authenticated HTTP request with a Bearer access token.
 */
export async function makeAuthenticatedRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  accessToken: string,
  options: RequestOptions = {}
): Promise<Response> {
  return makeRequest(app, method, path, {
    ...options,
    headers: {
      ...options.headers,
      Authorization: `Bearer ${accessToken}`,
    },
  });
}

const SuccessEnvelopeSchema = z.object({ success: z.literal(true), data: z.unknown() });

const FailureEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string(),
    message: z.string(),
    issues: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
  }),
});

/**
 * Parse a success envelope and validate its data against `schema`
 */
export async function readData<T extends z.ZodTypeAny>(
  response: Response,
  schema: T
): Promise<z.infer<T>> {
  const envelope = SuccessEnvelopeSchema.parse(await response.json());
  return schema.parse(envelope.data);
}

export async function readError(response: Response) {
  return FailureEnvelopeSchema.parse(await response.json()).error;
}

// Shapes the tests read back from responses
export const WalletViewSchema = z.object({
  id: z.string(),
  walletNumber: z.string(),
  balance: z.number(),
  currency: z.string(),
  status: z.string(),
});

export const TransactionViewSchema = z.object({
  id: z.string(),
  reference: z.string(),
  type: z.string(),
  status: z.string(),
  direction: z.string().nullable(),
  amount: z.number(),
  fee: z.number(),
  totalAmount: z.number(),
  senderId: z.string(),
  receiverId: z.string(),
  note: z.string().nullable(),
});
