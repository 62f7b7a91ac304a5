/**
 * Liveness and readiness probes.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { toError } from '@/core/errors.js';
import { systemClock } from '@/core/types.js';
import type { HealthProbe, HealthProbes, RouteDependencies } from '../types.js';

type DependencyStatus = 'up' | 'down';

/** Register health routes on a Fastify instance. */
export function healthRoutes(fastify: FastifyInstance, opts: RouteDependencies): void {
  const { healthProbes, logger } = opts;
  const clock = opts.clock ?? systemClock;

  async function probe(name: keyof HealthProbes, check: HealthProbe): Promise<DependencyStatus> {
    try {
      await check();
      return 'up';
    } catch (error) {
      logger.warn('Readiness probe failed', {
        component: 'health',
        dependency: name,
        error: toError(error).message,
      });
      return 'down';
    }
  }

  // GET /health: process is alive
  fastify.get('/health', () => {
    return { status: 'ok', timestamp: clock().toISOString() };
  });

  // GET /health/ready: store and broker both answer
  fastify.get('/health/ready', async (_request, reply: FastifyReply) => {
    const [store, broker] = await Promise.all([
      probe('store', healthProbes.store),
      probe('broker', healthProbes.broker),
    ]);
    const ready = store === 'up' && broker === 'up';

    await reply.status(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      dependencies: { store, broker },
      timestamp: clock().toISOString(),
    });
  });
}
