import { cors } from 'hono/cors';

/**
 * CORS for the configured browser origins; localhost on any port is allowed
 * outside production
 */
export function createCorsMiddleware(origins: readonly string[], allowLocalhost: boolean) {
  const allowed = new Set(origins);

  return cors({
    origin: (origin) => {
      if (origin && allowed.has(origin)) {
        return origin;
      }
      if (allowLocalhost && origin && /^http:\/\/localhost:\d+$/.test(origin)) {
        return origin;
      }
      return '';
    },
    allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposeHeaders: ['X-Request-Id'],
    maxAge: 86400, // 24 hours
  });
}
