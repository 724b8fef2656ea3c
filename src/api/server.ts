/**
 * Builds the Fastify instance: security plugins, error handler, health check
 * and routes. Listening is left to the caller.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { registerErrorHandler } from './error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export interface ApiServerOptions {
  /** Requests per minute per client; `false` disables limiting. */
  rateLimitPerMinute?: number | false;
  /** Maximum request body in bytes. */
  bodyLimit?: number;
}

export async function createApiServer(
  deps: RouteDependencies,
  options?: ApiServerOptions,
): Promise<FastifyInstance> {
  const server = Fastify({
    logger: false,
    bodyLimit: options?.bodyLimit ?? 1_048_576,
  });

  await server.register(helmet);
  const perMinute = options?.rateLimitPerMinute ?? 100;
  if (perMinute !== false) {
    await server.register(rateLimit, { max: perMinute, timeWindow: '1 minute' });
  }

  registerErrorHandler(server, deps.logger);

  server.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    agents: deps.connector
      .listConnections()
      .filter((connection) => connection.state === 'ready').length,
  }));

  await registerRoutes(server, deps);
  return server;
}
