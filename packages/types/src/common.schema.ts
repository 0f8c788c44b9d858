import { z } from 'zod';

/**
 * Monetary amount as sent by clients: a number or a decimal string.
 * Precision and range are checked by the ledger when it converts to cents.
 */
export const AmountSchema = z.union([
  z.number().finite('Amount must be a finite number'),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, 'Amount must be a decimal number'),
]);

export type AmountInput = z.infer<typeof AmountSchema>;

// Query-string pagination; values arrive as strings
export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;

export const UuidParamSchema = z.object({
  id: z.string().uuid('Invalid id'),
});

// Optional free-text fields: empty strings are treated as "not provided"
export const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .transform((value) => (value.length === 0 ? null : value))
    .nullable()
    .optional();
