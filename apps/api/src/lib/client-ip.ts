import { getConnInfo } from '@hono/node-server/conninfo';
import type { Context } from 'hono';
import { isIP } from 'node:net';
import type { AppBindings } from '../types/context.js';

function normalizeIp(value?: string | null): string | null {
  if (!value) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed && isIP(trimmed) ? trimmed : null;
}

function getRemoteAddress(c: Context<AppBindings>): string | null {
  try {
    return normalizeIp(getConnInfo(c).remote.address);
  } catch {
    // getConnInfo throws outside the node-server runtime (app.fetch in tests)
    return null;
  }
}

function getForwardedIp(c: Context<AppBindings>): string | null {
  const realIp = normalizeIp(c.req.header('x-real-ip'));
  if (realIp) {
    return realIp;
  }
  const firstHop = c.req.header('x-forwarded-for')?.split(',')[0];
  return normalizeIp(firstHop);
}

/**
 * Client IP for audit logs.
 *
 * Uses the connection address; forwarded headers are honoured only when the
 * connection comes from a proxy listed in TRUSTED_PROXY_IPS, or when there is
 * no connection info and trusted proxies are configured.
 */
export function resolveClientIp(c: Context<AppBindings>): string | undefined {
  const trusted = c.get('config').trustedProxyIps;
  const remoteIp = getRemoteAddress(c);

  if (trusted.length > 0 && (remoteIp === null || trusted.includes(remoteIp))) {
    const forwarded = getForwardedIp(c);
    if (forwarded) {
      return forwarded;
    }
  }

  return remoteIp ?? undefined;
}
