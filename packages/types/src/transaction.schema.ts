import { z } from 'zod';
import { AmountSchema, PaginationQuerySchema } from './common.schema.js';

/**
 * Transfer request. The receiver is addressed either by user id or by the
 * public wallet number, never both.
 */
export const SendMoneySchema = z
  .object({
    receiverId: z.string().uuid('Invalid receiver id').optional(),
    walletNumber: z.string().trim().min(1).max(64).optional(),
    amount: AmountSchema,
    note: z.string().trim().max(255, 'Note must be 255 characters or less').optional(),
  })
  .refine((value) => (value.receiverId === undefined) !== (value.walletNumber === undefined), {
    message: 'Provide exactly one of receiverId or walletNumber',
    path: ['receiverId'],
  });

export type SendMoneyInput = z.infer<typeof SendMoneySchema>;

export const TRANSACTION_DIRECTIONS = ['all', 'sent', 'received'] as const;
export type TransactionDirection = (typeof TRANSACTION_DIRECTIONS)[number];

export const ListTransactionsQuerySchema = PaginationQuerySchema.extend({
  direction: z.enum(TRANSACTION_DIRECTIONS).default('all'),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

export const TransactionReferenceParamSchema = z.object({
  reference: z.string().trim().min(1).max(64),
});
