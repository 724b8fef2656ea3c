/**
 * Tool Catalog Builder.
 *
 * Merges the operations of the agents relevant to one query into a single
 * namespaced tool list for the model, and dispatches the model's tool calls
 * back to the owning agent.
 */
import type { AgentToolProvider } from '@/agents/types.js';
import { ToolInvocationError } from '@/core/errors.js';
import { toError } from '@/core/result.js';
import type { AgentId } from '@/core/types.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { ToolDefinitionForProvider } from '@/providers/types.js';
import { checkToolName, decodeToolName, encodeToolName } from './tool-name.js';

const defaultLogger = createLogger({ name: 'tool-catalog' });

/** One tool as exposed to the model. */
export interface CatalogEntry {
  agentId: AgentId;
  toolName: string;
  qualifiedName: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallOutcome {
  text: string;
  isError: boolean;
}

export interface ToolCatalog {
  /** Entries in agent order, then in the order each agent listed them. */
  readonly entries: readonly CatalogEntry[];
  isEmpty(): boolean;
  toToolDefinitions(): ToolDefinitionForProvider[];
  lookup(qualifiedName: string): CatalogEntry | undefined;
  /** Run a tool call. Never throws: failures come back as `Error: …` text. */
  invoke(qualifiedName: string, args: Record<string, unknown>): Promise<ToolCallOutcome>;
}

export interface BuildToolCatalogOptions {
  agentIds: readonly AgentId[];
  resolveProvider: (agentId: AgentId) => AgentToolProvider | undefined;
  logger?: Logger;
}

/**
 * List the operations of every resolvable agent concurrently and merge them.
 * Agents that cannot be resolved or fail to list their operations are left out.
 */
export async function buildToolCatalog(options: BuildToolCatalogOptions): Promise<ToolCatalog> {
  const logger = options.logger ?? defaultLogger;
  const agentIds = [...new Set(options.agentIds)];

  const listings = await Promise.all(
    agentIds.map(async (agentId) => {
      const provider = options.resolveProvider(agentId);
      if (!provider) {
        logger.warn('Agent not available, leaving it out of the catalog', {
          component: 'tool-catalog',
          agentId,
        });
        return undefined;
      }
      try {
        return { agentId, provider, operations: await provider.listOperations() };
      } catch (error: unknown) {
        logger.error('Failed to list agent operations', {
          component: 'tool-catalog',
          agentId,
          error: toError(error).message,
        });
        return undefined;
      }
    }),
  );

  const entries: CatalogEntry[] = [];
  const byAgent = new Map<AgentId, Map<string, CatalogEntry>>();
  const providers = new Map<AgentId, AgentToolProvider>();

  for (const listing of listings) {
    if (!listing) continue;
    const { agentId, provider, operations } = listing;
    const tools = new Map<string, CatalogEntry>();
    byAgent.set(agentId, tools);
    providers.set(agentId, provider);

    for (const op of operations) {
      const problem = checkToolName(agentId, op.name);
      if (problem !== undefined) {
        logger.warn('Skipping tool that cannot be exposed', {
          component: 'tool-catalog',
          agentId,
          toolName: op.name,
          reason: problem,
        });
        continue;
      }
      if (tools.has(op.name)) {
        logger.warn('Duplicate tool name, keeping the first', {
          component: 'tool-catalog',
          agentId,
          toolName: op.name,
        });
        continue;
      }
      const entry: CatalogEntry = {
        agentId,
        toolName: op.name,
        qualifiedName: encodeToolName(agentId, op.name),
        description: `[${agentId}] ${op.description}`,
        inputSchema: op.inputSchema,
      };
      tools.set(op.name, entry);
      entries.push(entry);
    }
  }

  logger.info('Tool catalog built', {
    component: 'tool-catalog',
    requestedAgents: agentIds,
    includedAgents: [...byAgent.keys()],
    toolCount: entries.length,
  });

  const lookup = (qualifiedName: string): CatalogEntry | undefined => {
    const decoded = decodeToolName(qualifiedName);
    if (!decoded) return undefined;
    return byAgent.get(decoded.agentId)?.get(decoded.toolName);
  };

  return {
    entries,

    isEmpty() {
      return entries.length === 0;
    },

    toToolDefinitions() {
      return entries.map((entry) => ({
        name: entry.qualifiedName,
        description: entry.description,
        inputSchema: entry.inputSchema,
      }));
    },

    lookup,

    async invoke(qualifiedName, args) {
      const entry = lookup(qualifiedName);
      const provider = entry ? providers.get(entry.agentId) : undefined;
      if (!entry || !provider) {
        const failure = new ToolInvocationError(qualifiedName, 'unknown tool');
        logger.warn('Model requested a tool that is not in the catalog', {
          component: 'tool-catalog',
          qualifiedName,
        });
        return { text: `Error: ${failure.message}`, isError: true };
      }

      logger.info('Invoking tool', {
        component: 'tool-catalog',
        agentId: entry.agentId,
        toolName: entry.toolName,
      });

      try {
        return await provider.invoke(entry.toolName, args);
      } catch (error: unknown) {
        const cause = toError(error);
        const failure = new ToolInvocationError(qualifiedName, cause.message, cause);
        logger.error('Tool invocation failed', {
          component: 'tool-catalog',
          agentId: entry.agentId,
          toolName: entry.toolName,
          error: failure.message,
        });
        return { text: `Error: ${failure.message}`, isError: true };
      }
    },
  };
}
