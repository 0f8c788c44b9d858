#!/usr/bin/env tsx
/**
 * Bootstrap a database
 *
 * Applies packages/database/sql/schema.sql (idempotent) and, when no admin
 * exists yet, provisions one from BOOTSTRAP_ADMIN_EMAIL / BOOTSTRAP_ADMIN_PASSWORD.
 * Re-running never creates a second admin or touches existing accounts.
 *
 * Usage:
 *   DATABASE_URL="..." BOOTSTRAP_ADMIN_EMAIL="..." BOOTSTRAP_ADMIN_PASSWORD="..." \
 *     npm run db:bootstrap
 */

import { hashPassword } from '@payflow/auth';
import { DrizzleUserRepository } from '@payflow/core';
import { createDatabase, readSchemaSql, users } from '@payflow/database';
import { PasswordSchema } from '@payflow/types';
import { eq } from 'drizzle-orm';
import { z } from 'zod';

const EnvSchema = z.object({
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL is required'),
  BOOTSTRAP_ADMIN_EMAIL: z.string().trim().email().optional(),
  BOOTSTRAP_ADMIN_PASSWORD: PasswordSchema.optional(),
  BOOTSTRAP_ADMIN_FIRST_NAME: z.string().trim().min(1).default('Platform'),
  BOOTSTRAP_ADMIN_LAST_NAME: z.string().trim().min(1).default('Admin'),
});

async function main() {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`❌ ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exitCode = 1;
    return;
  }
  const env = parsed.data;

  const database = createDatabase({ connectionString: env.DATABASE_URL, maxConnections: 1 });
  try {
    console.log('📦 Applying schema...');
    await database.pool.query(await readSchemaSql());
    console.log('✅ Schema is up to date');

    const [existingAdmin] = await database.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.role, 'admin'))
      .limit(1);

    if (existingAdmin) {
      console.log('ℹ️  An admin already exists, skipping provisioning');
      return;
    }

    if (!env.BOOTSTRAP_ADMIN_EMAIL || !env.BOOTSTRAP_ADMIN_PASSWORD) {
      console.warn(
        '⚠️  No admin exists. Set BOOTSTRAP_ADMIN_EMAIL and BOOTSTRAP_ADMIN_PASSWORD to create one.'
      );
      return;
    }

    const repo = new DrizzleUserRepository(database.db);
    if (await repo.findByEmail(env.BOOTSTRAP_ADMIN_EMAIL)) {
      console.error(`❌ ${env.BOOTSTRAP_ADMIN_EMAIL} is already registered as a regular user`);
      process.exitCode = 1;
      return;
    }

    const { user, wallet } = await repo.createWithWallet({
      firstName: env.BOOTSTRAP_ADMIN_FIRST_NAME,
      lastName: env.BOOTSTRAP_ADMIN_LAST_NAME,
      email: env.BOOTSTRAP_ADMIN_EMAIL,
      passwordHash: await hashPassword(env.BOOTSTRAP_ADMIN_PASSWORD),
      phone: null,
      country: null,
      address: null,
      role: 'admin',
    });
    console.log(`✅ Created admin ${user.email} (wallet ${wallet.walletNumber})`);
  } finally {
    await database.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Bootstrap failed:', error);
  process.exitCode = 1;
});
