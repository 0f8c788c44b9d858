import { z } from 'zod';
import { PaginationQuerySchema } from './common.schema.js';

export const ListNotificationsQuerySchema = PaginationQuerySchema.extend({
  unreadOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type ListNotificationsQuery = z.infer<typeof ListNotificationsQuerySchema>;
