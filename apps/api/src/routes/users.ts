import { zValidator } from '@hono/zod-validator';
import { ChangePasswordSchema, UpdateProfileSchema } from '@payflow/types';
import { Hono } from 'hono';
import { resolveClientIp } from '../lib/client-ip.js';
import { throwOnInvalid } from '../lib/errors.js';
import { success } from '../lib/responses.js';
import { authMiddleware } from '../middleware/auth.js';
import { requireCapability } from '../middleware/capabilities.js';
import type { AppBindings } from '../types/context.js';

const usersRoute = new Hono<AppBindings>();

usersRoute.use('*', authMiddleware);

/**
 * GET /api/users - Active users the caller can send money to
 */
usersRoute.get('/', requireCapability('profile:read'), async (c) => {
  const recipients = await c.get('services').users.listRecipients(c.get('userId'));
  return c.json(success(recipients));
});

usersRoute.get('/profile', requireCapability('profile:read'), async (c) => {
  const profile = await c.get('services').profiles.getCurrentProfile(c.get('userId'));
  return c.json(success(profile));
});

usersRoute.put(
  '/profile',
  requireCapability('profile:write'),
  zValidator('json', UpdateProfileSchema, throwOnInvalid),
  async (c) => {
    const profile = await c
      .get('services')
      .profiles.updateProfile(c.get('userId'), c.req.valid('json'));
    return c.json(success(profile));
  }
);

usersRoute.post(
  '/change-password',
  requireCapability('profile:write'),
  zValidator('json', ChangePasswordSchema, throwOnInvalid),
  async (c) => {
    const { currentPassword, newPassword } = c.req.valid('json');
    await c.get('services').users.changePassword({
      userId: c.get('userId'),
      currentPassword,
      newPassword,
      ip: resolveClientIp(c),
    });
    return c.json(success({ message: 'Password changed successfully' }));
  }
);

export { usersRoute };
