/**
 * Query route: runs one orchestration and returns the final text.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

// ─── Schemas ────────────────────────────────────────────────────

export const queryRequestSchema = z.object({
  query: z.string().trim().min(1).max(10_000),
  context: z
    .array(
      z.object({
        author: z.string().min(1),
        text: z.string(),
      }),
    )
    .max(200)
    .default([]),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the POST /query route. */
export function queryRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { orchestrator, logger } = deps;

  fastify.post('/query', async (request, reply) => {
    const body = queryRequestSchema.parse(request.body);

    logger.info('Query received', {
      component: 'query-route',
      length: body.query.length,
      contextEntries: body.context.length,
    });

    const response = await orchestrator.submit(body.query, body.context);
    return sendSuccess(reply, { response });
  });
}
