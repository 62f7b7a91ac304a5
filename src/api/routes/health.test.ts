import { describe, it, expect, beforeEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './health.js';
import { createMockDeps } from '@/testing/fixtures/routes.js';
import type { RouteDependencies } from '../types.js';

let app: FastifyInstance;
let deps: ReturnType<typeof createMockDeps>;

beforeEach(async () => {
  deps = createMockDeps();
  app = Fastify();
  await app.register(
    (instance, opts: RouteDependencies, done) => {
      healthRoutes(instance, opts);
      done();
    },
    deps,
  );
  await app.ready();
});

describe('GET /health', () => {
  it('reports liveness without touching dependencies', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', timestamp: '2024-05-17T12:00:00.000Z' });
    expect(deps.healthProbes.store).not.toHaveBeenCalled();
  });
});

describe('GET /health/ready', () => {
  it('is ready when store and broker answer', async () => {
    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'ready',
      dependencies: { store: 'up', broker: 'up' },
      timestamp: '2024-05-17T12:00:00.000Z',
    });
  });

  it('returns 503 naming the dependency that is down', async () => {
    deps.healthProbes.broker.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      status: 'not_ready',
      dependencies: { store: 'up', broker: 'down' },
      timestamp: '2024-05-17T12:00:00.000Z',
    });
    expect(deps.logger.warn).toHaveBeenCalledWith('Readiness probe failed', {
      component: 'health',
      dependency: 'broker',
      error: 'connect ECONNREFUSED',
    });
  });
});
