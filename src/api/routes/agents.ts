/**
 * Agent routes: connection state of every agent the orchestrator can use.
 */
import type { FastifyInstance } from 'fastify';
import type { AgentConnectionStatus } from '@/mcp/types.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

interface AgentView extends AgentConnectionStatus {
  /** True for agents running inside this process. */
  local: boolean;
}

/** Register GET /agents. */
export function agentRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { connector, localAgents } = deps;

  fastify.get('/agents', async (_request, reply) => {
    const agents: AgentView[] = [
      ...connector.listConnections().map((status) => ({ ...status, local: false })),
      ...localAgents.map((agent) => ({
        agentId: agent.provider.agentId,
        state: 'ready' as const,
        capabilities: [...agent.capabilities],
        local: true,
      })),
    ];
    return sendSuccess(reply, { agents });
  });
}
