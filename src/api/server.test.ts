import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createApiServer } from './server.js';
import { createMockRouteDeps } from '@/testing/helpers/index.js';

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe('createApiServer', () => {
  it('serves the health check', async () => {
    app = await createApiServer(createMockRouteDeps());

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', agents: 1 });
  });

  it('applies security headers', async () => {
    app = await createApiServer(createMockRouteDeps());

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('limits request rate per client', async () => {
    app = await createApiServer(createMockRouteDeps(), { rateLimitPerMinute: 2 });

    await app.inject({ method: 'GET', url: '/health' });
    await app.inject({ method: 'GET', url: '/health' });
    const third = await app.inject({ method: 'GET', url: '/health' });

    expect(third.statusCode).toBe(429);
  });

  it('registers the Slack route only when configured', async () => {
    const payload = { type: 'url_verification', challenge: 'chal-1' };

    app = await createApiServer(createMockRouteDeps(), { rateLimitPerMinute: false });
    const without = await app.inject({ method: 'POST', url: '/slack/events', payload });
    await app.close();

    app = await createApiServer(
      { ...createMockRouteDeps(), slack: { mentionHandler: { handle: vi.fn() } } },
      { rateLimitPerMinute: false },
    );
    const withSlack = await app.inject({ method: 'POST', url: '/slack/events', payload });

    expect(without.statusCode).toBe(404);
    expect(withSlack.json()).toEqual({ challenge: 'chal-1' });
  });

  it('keeps regular JSON parsing outside the Slack route', async () => {
    const deps = { ...createMockRouteDeps(), slack: { mentionHandler: { handle: vi.fn() } } };
    app = await createApiServer(deps, { rateLimitPerMinute: false });

    const response = await app.inject({ method: 'POST', url: '/query', payload: { query: 'status?' } });

    expect(response.json()).toEqual({ success: true, data: { response: 'Here is the answer.' } });
    expect(deps.orchestrator.submit).toHaveBeenCalledWith('status?', []);
  });
});
