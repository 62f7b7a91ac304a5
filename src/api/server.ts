/**
 * Fastify server assembly: security plugins, error handler and routes.
 * The returned instance is ready but not listening.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { registerErrorHandler } from './error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export interface ServerOptions {
  /** Prefix for versioned routes, e.g. `/api_v1`. */
  apiPrefix: string;
  corsOrigins: string[];
  /** Requests per client per minute. */
  rateLimitPerMinute?: number;
}

export async function buildServer(
  deps: RouteDependencies,
  options: ServerOptions,
): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });

  await server.register(cors, { origin: options.corsOrigins, credentials: true });
  await server.register(helmet);
  await server.register(rateLimit, {
    max: options.rateLimitPerMinute ?? 100,
    timeWindow: '1 minute',
  });

  registerErrorHandler(server, deps.logger);
  await registerRoutes(server, deps, options.apiPrefix);
  await server.ready();

  return server;
}
