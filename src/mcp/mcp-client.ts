/**
 * Creates agent connections using the @modelcontextprotocol/sdk stdio transport.
 * Returns our MCPConnection interface, hiding SDK details from the rest of the system.
 *
 * The connection attempt is a scoped acquisition: whatever the attempt managed to
 * open (child process, client session) is closed again on every failure path,
 * including the timeout.
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import {
  StdioClientTransport,
  getDefaultEnvironment,
} from '@modelcontextprotocol/sdk/client/stdio.js';
import type { AgentDescriptor, AgentOperation, OperationResult } from '@/agents/types.js';
import { toError } from '@/core/result.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { MCPConnection, MCPTransportStatus } from './types.js';
import { AgentConnectionError, AgentTimeoutError } from './errors.js';

const defaultLogger = createLogger({ name: 'mcp-client' });

/** Default connection timeout. */
export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

/** Options for creating an agent connection. */
export interface CreateMCPConnectionOptions {
  descriptor: AgentDescriptor;
  /** Hard limit for spawn + MCP initialize. Defaults to 30000. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Spawns the agent process and completes the MCP handshake.
 *
 * @throws AgentTimeoutError when the handshake does not finish within `timeoutMs`
 * @throws AgentConnectionError for any other failure
 */
export async function createMCPConnection(
  options: CreateMCPConnectionOptions,
): Promise<MCPConnection> {
  const { descriptor, timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS } = options;
  const logger = options.logger ?? defaultLogger;
  const agentId = descriptor.id;

  logger.info('Connecting to agent', {
    component: 'mcp-client',
    agentId,
    command: descriptor.command,
  });

  const client = new Client(
    { name: 'huddle-core', version: '1.0.0' },
    { capabilities: {} },
  );

  const transport = new StdioClientTransport({
    command: descriptor.command,
    args: descriptor.args,
    env: { ...getDefaultEnvironment(), ...resolveAgentEnv(descriptor.env, logger) },
    stderr: 'pipe',
  });

  const abortController = new AbortController();

  try {
    await withTimeout(
      client.connect(transport, { signal: abortController.signal }),
      timeoutMs,
      () => {
        abortController.abort();
        return new AgentTimeoutError(agentId, 'connect', timeoutMs);
      },
    );
  } catch (error: unknown) {
    await releaseAttempt(agentId, client, transport, logger);
    if (error instanceof AgentTimeoutError) {
      throw error;
    }
    const cause = toError(error);
    throw new AgentConnectionError(agentId, cause.message, cause);
  }

  logger.info('Agent connected', { component: 'mcp-client', agentId });

  let status: MCPTransportStatus = 'connected';
  const listeners: Array<(status: MCPTransportStatus) => void> = [];
  const setStatus = (next: MCPTransportStatus): void => {
    if (status === next) return;
    status = next;
    for (const listener of listeners) listener(next);
  };

  client.onclose = () => {
    logger.info('Agent transport closed', { component: 'mcp-client', agentId });
    setStatus('disconnected');
  };

  client.onerror = (error: Error) => {
    logger.error('Agent transport error', {
      component: 'mcp-client',
      agentId,
      error: error.message,
    });
    setStatus('error');
  };

  return {
    get agentId() {
      return agentId;
    },

    get status() {
      return status;
    },

    onStatusChange(listener) {
      listeners.push(listener);
    },

    async listOperations(): Promise<AgentOperation[]> {
      const result = await client.listTools();
      return result.tools.map((t) => ({
        name: t.name,
        description: t.description ?? '',
        inputSchema: { ...t.inputSchema },
      }));
    },

    async invoke(name: string, args: Record<string, unknown>): Promise<OperationResult> {
      const result = await client.callTool({ name, arguments: args });
      const isError = 'isError' in result && result.isError === true;

      if (!('content' in result) || !Array.isArray(result.content)) {
        return { text: JSON.stringify(result), isError };
      }

      const texts: string[] = [];
      for (const item of result.content) {
        if (isTextContent(item)) texts.push(item.text);
      }

      return { text: texts.length > 0 ? texts.join('\n') : 'No result', isError };
    },

    async close(): Promise<void> {
      setStatus('disconnected');
      await client.close();
      logger.info('Agent connection closed', { component: 'mcp-client', agentId });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────

function isTextContent(item: unknown): item is { type: 'text'; text: string } {
  return (
    typeof item === 'object' &&
    item !== null &&
    'type' in item &&
    item.type === 'text' &&
    'text' in item &&
    typeof item.text === 'string'
  );
}

/**
 * Races a promise against a timer. `onTimeout` builds the rejection and may
 * cancel the underlying work.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

/** Close whatever a failed attempt opened. Close failures are logged, not rethrown. */
async function releaseAttempt(
  agentId: string,
  client: Client,
  transport: StdioClientTransport,
  logger: Logger,
): Promise<void> {
  const outcomes = await Promise.allSettled([client.close(), transport.close()]);
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') {
      logger.error('Error releasing failed agent connection', {
        component: 'mcp-client',
        agentId,
        error: toError(outcome.reason).message,
      });
    }
  }
}

/**
 * Resolves environment variable references.
 * Config values are env var NAMES (e.g. { JIRA_TOKEN: "HUDDLE_JIRA_TOKEN" }),
 * resolved to actual values from process.env.
 */
function resolveAgentEnv(
  envConfig: Record<string, string>,
  logger: Logger,
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, envVarName] of Object.entries(envConfig)) {
    const value = process.env[envVarName];
    if (value !== undefined) {
      resolved[key] = value;
    } else {
      logger.warn('Agent env var not found', {
        component: 'mcp-client',
        key,
        envVarName,
      });
    }
  }
  return resolved;
}
