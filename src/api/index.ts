// REST endpoints (Fastify)
export type {
  ApiError,
  ApiResponse,
  RouteDependencies,
  SlackRouteDependencies,
} from './types.js';

export { registerErrorHandler, sendSuccess, sendError, sendNotFound } from './error-handler.js';
export { registerRoutes } from './routes/index.js';
export { createApiServer } from './server.js';
export type { ApiServerOptions } from './server.js';
