import { Hono } from 'hono';
import { describe, expect, it } from 'vitest';
import { TEST_CONFIG } from '../../test/helpers.js';
import type { AppBindings } from '../../types/context.js';
import { resolveClientIp } from '../client-ip.js';

function appWithProxies(trustedProxyIps: string[]) {
  const app = new Hono<AppBindings>();
  app.use('*', async (c, next) => {
    c.set('config', { ...TEST_CONFIG, trustedProxyIps });
    await next();
  });
  app.get('/ip', (c) => c.text(resolveClientIp(c) ?? 'none'));
  return app;
}

describe('resolveClientIp', () => {
  it('ignores forwarded headers when no proxy is trusted', async () => {
    const response = await appWithProxies([]).request('/ip', {
      headers: { 'x-forwarded-for': '203.0.113.7' },
    });

    expect(await response.text()).toBe('none');
  });

  it('uses the first forwarded hop once proxies are configured', async () => {
    const response = await appWithProxies(['10.0.0.1']).request('/ip', {
      headers: { 'x-forwarded-for': '203.0.113.7, 10.0.0.1' },
    });

    expect(await response.text()).toBe('203.0.113.7');
  });

  it('rejects header values that are not IP addresses', async () => {
    const response = await appWithProxies(['10.0.0.1']).request('/ip', {
      headers: { 'x-real-ip': 'not-an-ip' },
    });

    expect(await response.text()).toBe('none');
  });
});
