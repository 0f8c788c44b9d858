import { z } from 'zod';
import { AmountSchema } from './common.schema.js';

export const AddFundsSchema = z.object({
  amount: AmountSchema,
});

export type AddFundsInput = z.infer<typeof AddFundsSchema>;
