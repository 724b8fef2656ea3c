/**
 * Read-only views of coordinator state.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { coordinationRoleSchema } from '@/config/schema.js';
import type { RouteDependencies } from '../types.js';
import { sendNotFound, sendSuccess } from '../error-handler.js';

const messagesQuerySchema = z.object({
  agent: coordinationRoleSchema.optional(),
});

/** Register the /coordination routes. */
export function coordinationRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { coordinator } = deps;

  fastify.get('/coordination/tasks', async (_request, reply) => {
    return sendSuccess(reply, { tasks: coordinator.listTasks() });
  });

  fastify.get<{ Params: { taskId: string } }>('/coordination/tasks/:taskId', async (request, reply) => {
    const task = coordinator.getTask(request.params.taskId);
    if (!task) {
      return sendNotFound(reply, 'Task', request.params.taskId);
    }
    return sendSuccess(reply, task);
  });

  // Unlike the get_messages tool this does not advance any read cursor.
  fastify.get('/coordination/messages', async (request, reply) => {
    const { agent } = messagesQuerySchema.parse(request.query);
    const messages = coordinator
      .listMessages()
      .filter((message) => agent === undefined || message.to === agent);
    return sendSuccess(reply, { messages });
  });

  fastify.get('/coordination/workload', async (_request, reply) => {
    return sendSuccess(reply, { workloads: coordinator.getAllWorkloads() });
  });

  fastify.get('/coordination/workflows', async (_request, reply) => {
    return sendSuccess(reply, { workflows: coordinator.listActiveWorkflows() });
  });

  fastify.get('/coordination/metrics', async (_request, reply) => {
    return sendSuccess(reply, coordinator.getMetrics());
  });
}
