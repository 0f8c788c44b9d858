import { z } from 'zod';
import { optionalText } from './common.schema.js';

export const UpdateProfileSchema = z
  .object({
    firstName: z.string().trim().min(1, 'First name cannot be empty').max(100).optional(),
    lastName: z.string().trim().min(1, 'Last name cannot be empty').max(100).optional(),
    phone: optionalText(30),
    country: optionalText(100),
    address: optionalText(255),
  })
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateProfileInput = z.infer<typeof UpdateProfileSchema>;
