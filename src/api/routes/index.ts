/**
 * Route registration: registers all API route plugins with Fastify.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { healthRoutes } from './health.js';
import { tradingResultsRoutes } from './trading-results.js';

/** Register all API routes; versioned routes go under `apiPrefix`. */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
  apiPrefix: string,
): Promise<void> {
  await fastify.register(
    (instance, opts: RouteDependencies, done) => {
      healthRoutes(instance, opts);
      done();
    },
    deps,
  );
  await fastify.register(
    (instance, opts: RouteDependencies, done) => {
      tradingResultsRoutes(instance, opts);
      done();
    },
    { ...deps, prefix: apiPrefix },
  );
}
