/**
 * Registration, login and the current identity
 *
 * - POST /api/auth/register: public, returns the new user, wallet and a token
 * - POST /api/auth/login: public
 * - GET /api/auth/me: profile:read
 */

import { zValidator } from '@hono/zod-validator';
import { signAccessToken, type IssuedAccessToken } from '@payflow/auth';
import { LoginSchema, RegisterSchema } from '@payflow/types';
import { Hono } from 'hono';
import { resolveClientIp } from '../lib/client-ip.js';
import { throwOnInvalid } from '../lib/errors.js';
import { success } from '../lib/responses.js';
import { authMiddleware } from '../middleware/auth.js';
import { requireCapability } from '../middleware/capabilities.js';
import type { AppBindings } from '../types/context.js';

function tokenResponse(issued: IssuedAccessToken) {
  return {
    token: issued.token,
    tokenType: 'Bearer' as const,
    expiresIn: issued.expiresIn,
  };
}

const authRoute = new Hono<AppBindings>();

authRoute.post('/register', zValidator('json', RegisterSchema, throwOnInvalid), async (c) => {
  const body = c.req.valid('json');
  const { user, wallet } = await c.get('services').users.registerUser({
    ...body,
    ip: resolveClientIp(c),
  });
  const issued = await signAccessToken(c.get('config').accessToken, { userId: user.id });

  return c.json(success({ user, wallet, ...tokenResponse(issued) }), 201);
});

authRoute.post('/login', zValidator('json', LoginSchema, throwOnInvalid), async (c) => {
  const { email, password } = c.req.valid('json');
  const user = await c.get('services').users.authenticate({
    email,
    password,
    ip: resolveClientIp(c),
  });
  const issued = await signAccessToken(c.get('config').accessToken, { userId: user.id });

  return c.json(success({ user, ...tokenResponse(issued) }));
});

authRoute.get('/me', authMiddleware, requireCapability('profile:read'), async (c) => {
  const auth = c.get('auth');
  const profile = await c.get('services').profiles.getCurrentProfile(c.get('userId'));

  return c.json(
    success({
      ...profile,
      capabilities: auth?.capabilities ?? [],
    })
  );
});

export { authRoute };
