import { z } from 'zod';
import { optionalText } from './common.schema.js';

export const CreateBeneficiarySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100),
  email: z.string().trim().email('Invalid email address'),
  walletNumber: z.string().trim().min(1, 'Wallet number is required').max(64),
  phone: optionalText(30),
  relationship: optionalText(50),
});

export type CreateBeneficiaryInput = z.infer<typeof CreateBeneficiarySchema>;

export const UpdateBeneficiarySchema = z
  .object({
    name: z.string().trim().min(1, 'Name cannot be empty').max(100).optional(),
    email: z.string().trim().email('Invalid email address').optional(),
    walletNumber: z.string().trim().min(1).max(64).optional(),
    phone: optionalText(30),
    relationship: optionalText(50),
  })
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateBeneficiaryInput = z.infer<typeof UpdateBeneficiarySchema>;
