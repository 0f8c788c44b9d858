import { zValidator } from '@hono/zod-validator';
import { ListNotificationsQuerySchema, UuidParamSchema } from '@payflow/types';
import { Hono } from 'hono';
import { throwOnInvalid } from '../lib/errors.js';
import { success } from '../lib/responses.js';
import { authMiddleware } from '../middleware/auth.js';
import { requireCapability } from '../middleware/capabilities.js';
import type { AppBindings } from '../types/context.js';

const notificationsRoute = new Hono<AppBindings>();

notificationsRoute.use('*', authMiddleware, requireCapability('notifications:manage'));

notificationsRoute.get(
  '/',
  zValidator('query', ListNotificationsQuerySchema, throwOnInvalid),
  async (c) => {
    const page = await c
      .get('services')
      .notifications.listNotifications(c.get('userId'), c.req.valid('query'));
    return c.json(success(page));
  }
);

notificationsRoute.get('/unread-count', async (c) => {
  const count = await c.get('services').notifications.unreadCount(c.get('userId'));
  return c.json(success({ count }));
});

notificationsRoute.post('/read-all', async (c) => {
  const result = await c.get('services').notifications.markAllRead(c.get('userId'));
  return c.json(success(result));
});

// Registered before DELETE /:id so "read" is not parsed as an id
notificationsRoute.delete('/read', async (c) => {
  const result = await c.get('services').notifications.clearRead(c.get('userId'));
  return c.json(success(result));
});

notificationsRoute.patch(
  '/:id/read',
  zValidator('param', UuidParamSchema, throwOnInvalid),
  async (c) => {
    const notification = await c
      .get('services')
      .notifications.markRead(c.get('userId'), c.req.valid('param').id);
    return c.json(success(notification));
  }
);

notificationsRoute.delete('/:id', zValidator('param', UuidParamSchema, throwOnInvalid), async (c) => {
  const { id } = c.req.valid('param');
  await c.get('services').notifications.deleteNotification(c.get('userId'), id);
  return c.json(success({ id, deleted: true }));
});

export { notificationsRoute };
