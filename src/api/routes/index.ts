/**
 * Route registration: registers all API route plugins with Fastify.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { queryRoutes } from './query.js';
import { agentRoutes } from './agents.js';
import { coordinationRoutes } from './coordination.js';
import { slackEventRoutes } from './slack-events.js';

/** Register all API routes on the Fastify instance. */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  queryRoutes(fastify, deps);
  agentRoutes(fastify, deps);
  coordinationRoutes(fastify, deps);

  if (deps.slack) {
    await fastify.register(slackEventRoutes, {
      mentionHandler: deps.slack.mentionHandler,
      signingSecret: deps.slack.signingSecret,
      logger: deps.logger,
    });
  }
}
