/**
 * The top-level entry point: turns a free-text query into one answer.
 *
 * Routing picks the relevant agents, the catalog gathers their tools and the
 * loop lets the model use them. Every failure ends in a user-facing sentence;
 * `submit` never rejects.
 */
import { nanoid } from 'nanoid';
import type { AgentToolProvider } from '@/agents/types.js';
import { buildToolCatalog } from '@/catalog/tool-catalog.js';
import type { OrchestrationConfig, RoutingConfig } from '@/config/schema.js';
import { CatalogError } from '@/core/errors.js';
import { toError } from '@/core/result.js';
import type { AgentId, ThreadEntry } from '@/core/types.js';
import { toSessionId, toTraceId } from '@/core/types.js';
import type { AgentConnector } from '@/mcp/agent-connector.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { LLMProvider } from '@/providers/types.js';
import { analyzeIntent } from '@/routing/intent-router.js';
import { runOrchestrationLoop } from './orchestration-loop.js';
import {
  buildContextMessage,
  buildSystemPrompt,
  type PromptAgentSummary,
} from './prompt-builder.js';

const defaultLogger = createLogger({ name: 'orchestrator' });

export const NO_AGENTS_MESSAGE =
  "I'm sorry, but I couldn't connect to any agents to help with your request.";

export const ITERATION_LIMIT_MESSAGE =
  "I've reached the maximum number of iterations while processing your request. Please try a simpler query.";

export const FAILURE_MESSAGE =
  "I'm sorry, I ran into a problem while processing your request. Please try again in a moment.";

/** An agent that lives inside this process, such as the coordinator. */
export interface LocalAgent {
  provider: AgentToolProvider;
  capabilities: string[];
}

export interface OrchestratorOptions {
  connector: Pick<AgentConnector, 'getProvider'>;
  provider: LLMProvider;
  routing: RoutingConfig;
  orchestration: OrchestrationConfig;
  /** Agents described in the system prompt. Local agents are added automatically. */
  agents?: readonly PromptAgentSummary[];
  localAgents?: readonly LocalAgent[];
  logger?: Logger;
}

export interface Orchestrator {
  /** Answer a query. Resolves with user-facing text in every case. */
  submit(query: string, priorContext?: readonly ThreadEntry[]): Promise<string>;
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const { connector, provider, routing, orchestration } = options;
  const logger = options.logger ?? defaultLogger;

  const localAgents = new Map<AgentId, AgentToolProvider>();
  for (const local of options.localAgents ?? []) {
    localAgents.set(local.provider.agentId, local.provider);
  }

  const systemPrompt = buildSystemPrompt([
    ...(options.agents ?? []),
    ...(options.localAgents ?? []).map((local) => ({
      agentId: local.provider.agentId,
      capabilities: local.capabilities,
    })),
  ]);

  const resolveProvider = (agentId: AgentId): AgentToolProvider | undefined =>
    localAgents.get(agentId) ?? connector.getProvider(agentId);

  return {
    async submit(query, priorContext = []) {
      const sessionId = toSessionId(nanoid());
      const traceId = toTraceId(nanoid());

      try {
        const analysis = analyzeIntent(query, routing);
        logger.info('Query received', {
          component: 'orchestrator',
          sessionId,
          traceId,
          relevantAgents: analysis.relevantAgents,
          complexity: analysis.complexity,
        });

        const catalog = await buildToolCatalog({
          agentIds: analysis.relevantAgents,
          resolveProvider,
          logger,
        });

        if (catalog.isEmpty()) {
          const error = new CatalogError(analysis.relevantAgents);
          logger.warn('No tools available for query', {
            component: 'orchestrator',
            sessionId,
            error: error.message,
          });
          return NO_AGENTS_MESSAGE;
        }

        const outcome = await runOrchestrationLoop({
          provider,
          catalog,
          systemPrompt,
          messages: [
            {
              role: 'user',
              content: buildContextMessage({
                analysis,
                priorContext,
                limit: orchestration.threadContextLimit,
              }),
            },
          ],
          maxIterations: orchestration.maxIterations,
          maxOutputTokens: orchestration.maxOutputTokens,
          temperature: orchestration.temperature,
          sessionId,
          traceId,
          logger,
        });

        switch (outcome.status) {
          case 'done':
            return outcome.text;
          case 'iteration_exceeded':
            return ITERATION_LIMIT_MESSAGE;
          case 'errored':
            return FAILURE_MESSAGE;
        }
      } catch (error: unknown) {
        logger.error('Unexpected failure while answering query', {
          component: 'orchestrator',
          sessionId,
          traceId,
          error: toError(error).message,
        });
        return FAILURE_MESSAGE;
      }
    },
  };
}
