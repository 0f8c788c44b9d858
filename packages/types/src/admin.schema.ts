import { z } from 'zod';
import { PaginationQuerySchema } from './common.schema.js';

export const AdminListUsersQuerySchema = PaginationQuerySchema.extend({
  search: z.string().trim().max(100).optional(),
  status: z.enum(['active', 'suspended']).optional(),
});

export type AdminListUsersQuery = z.infer<typeof AdminListUsersQuerySchema>;

export const AdminListWalletsQuerySchema = PaginationQuerySchema.extend({
  search: z.string().trim().max(100).optional(),
  status: z.enum(['active', 'frozen']).optional(),
});

export type AdminListWalletsQuery = z.infer<typeof AdminListWalletsQuerySchema>;

export const STATS_PERIODS = ['today', 'week', 'month', 'year', 'all'] as const;
export type StatsPeriod = (typeof STATS_PERIODS)[number];

export const AdminStatsQuerySchema = z.object({
  period: z.enum(STATS_PERIODS).default('month'),
});

export const AdminListTransactionsQuerySchema = PaginationQuerySchema.extend({
  type: z.enum(['transfer', 'deposit']).optional(),
  status: z.enum(['pending', 'completed', 'failed']).optional(),
  search: z.string().trim().max(100).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

export type AdminListTransactionsQuery = z.infer<typeof AdminListTransactionsQuerySchema>;

// An admin may only change account status and role; balances and identity stay untouched
export const AdminUpdateUserSchema = z
  .object({
    status: z.enum(['active', 'suspended']).optional(),
    role: z.enum(['user', 'admin']).optional(),
  })
  .strict()
  .refine((value) => value.status !== undefined || value.role !== undefined, {
    message: 'Provide status and/or role',
  });

export type AdminUpdateUserInput = z.infer<typeof AdminUpdateUserSchema>;
