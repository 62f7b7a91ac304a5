import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from './server.js';
import { createMockDeps } from '@/testing/fixtures/routes.js';

let app: FastifyInstance;
let deps: ReturnType<typeof createMockDeps>;

beforeAll(async () => {
  deps = createMockDeps();
  deps.tradingService.getLastTradingDates.mockResolvedValue(['2024-05-17']);
  app = await buildServer(deps, {
    apiPrefix: '/api_v1',
    corsOrigins: ['http://localhost:3000'],
    rateLimitPerMinute: 50,
  });
});

afterAll(async () => {
  await app.close();
});

describe('buildServer', () => {
  it('mounts trading routes under the API prefix', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api_v1/trading_results/last_trading_dates?days=1',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ success: true, data: { dates: ['2024-05-17'] } });
  });

  it('does not serve trading routes outside the prefix', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/last_trading_dates?days=1',
    });

    expect(response.statusCode).toBe(404);
  });

  it('mounts health routes at the root', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
  });

  it('answers allowed origins', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { origin: 'http://localhost:3000' },
    });

    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
  });

  it('sets security and rate-limit headers', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-content-type-options']).toBe('nosniff');
    expect(String(response.headers['x-ratelimit-limit'])).toBe('50');
  });

  it('maps validation failures through the global error handler', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api_v1/trading_results/last_trading_dates',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<{ error: { code: string } }>().error.code).toBe('VALIDATION_ERROR');
  });
});
