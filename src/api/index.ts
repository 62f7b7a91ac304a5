// HTTP API (Fastify)
export type {
  ApiError,
  ApiResponse,
  HealthProbe,
  HealthProbes,
  RouteDependencies,
} from './types.js';

export {
  registerErrorHandler,
  sendSuccess,
  sendError,
  sendAppError,
  sendNotFound,
} from './error-handler.js';
export { registerRoutes } from './routes/index.js';
export { buildServer } from './server.js';
export type { ServerOptions } from './server.js';
export { startApiService } from './bootstrap.js';
export type { ApiStartupSteps, StartupFailure, StartupStage } from './bootstrap.js';
