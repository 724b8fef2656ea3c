/**
 * Agent Connector — owns the connections to every configured agent process.
 *
 * Each agent moves through `disconnected → connecting → ready | failed`, and a
 * ready agent falls back to `disconnected` on shutdown or when its transport
 * closes. Transport errors that leave the session open are only logged.
 * One agent failing never affects the others.
 */
import { access } from 'node:fs/promises';
import type { AgentDescriptor, AgentToolProvider } from '@/agents/types.js';
import type { AgentId } from '@/core/types.js';
import { toError } from '@/core/result.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type {
  AgentConnectionState,
  AgentConnectionStatus,
  ConnectSummary,
  MCPConnection,
} from './types.js';
import { ALLOWED_TRANSITIONS } from './types.js';
import { ConnectionStateError } from './errors.js';
import { createMCPConnection, DEFAULT_CONNECT_TIMEOUT_MS } from './mcp-client.js';

const defaultLogger = createLogger({ name: 'agent-connector' });

/** Public interface for the agent connector. */
export interface AgentConnector {
  /** Connect every descriptor concurrently. Failures are logged and skipped. */
  connectAll(descriptors: readonly AgentDescriptor[]): Promise<ConnectSummary>;
  /** Connect one agent. Never throws; the returned status carries the outcome. */
  connect(descriptor: AgentDescriptor): Promise<AgentConnectionStatus>;
  /** Close every live connection and empty the registry. Never throws. */
  disconnectAll(): Promise<void>;
  /** The tool provider of a ready agent. */
  getProvider(agentId: AgentId): AgentToolProvider | undefined;
  isReady(agentId: AgentId): boolean;
  listConnections(): AgentConnectionStatus[];
}

/** Options for creating an agent connector. */
export interface AgentConnectorOptions {
  /** Connection timeout per agent in milliseconds. Defaults to 30000. */
  timeoutMs?: number;
  logger?: Logger;
}

interface ConnectionEntry {
  agentId: AgentId;
  state: AgentConnectionState;
  capabilities: string[];
  connection?: MCPConnection;
  error?: string;
}

const SCRIPT_EXTENSIONS = ['.py', '.js', '.mjs', '.cjs', '.ts'];

/**
 * The file an agent launch depends on, when it can be checked up front:
 * the first argument (the server script) or else the command itself, but only
 * when it looks like a path. Bare commands are resolved through PATH by the OS.
 */
export function resolveLaunchTarget(descriptor: AgentDescriptor): string | undefined {
  const target = descriptor.args[0] ?? descriptor.command;
  const pathLike =
    target.includes('/') ||
    target.includes('\\') ||
    target.startsWith('.') ||
    SCRIPT_EXTENSIONS.some((ext) => target.endsWith(ext));
  return pathLike ? target : undefined;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a connector that manages one connection per configured agent.
 */
export function createAgentConnector(options?: AgentConnectorOptions): AgentConnector {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const logger = options?.logger ?? defaultLogger;
  const entries = new Map<AgentId, ConnectionEntry>();

  const transition = (entry: ConnectionEntry, to: AgentConnectionState): void => {
    if (!ALLOWED_TRANSITIONS[entry.state].includes(to)) {
      throw new ConnectionStateError(entry.agentId, entry.state, to);
    }
    logger.debug('Agent connection state change', {
      component: 'agent-connector',
      agentId: entry.agentId,
      from: entry.state,
      to,
    });
    entry.state = to;
  };

  const snapshot = (entry: ConnectionEntry): AgentConnectionStatus => ({
    agentId: entry.agentId,
    state: entry.state,
    capabilities: [...entry.capabilities],
    ...(entry.error !== undefined && { error: entry.error }),
  });

  const fail = (entry: ConnectionEntry, message: string): AgentConnectionStatus => {
    transition(entry, 'failed');
    entry.error = message;
    logger.error('Failed to connect to agent', {
      component: 'agent-connector',
      agentId: entry.agentId,
      error: message,
    });
    return snapshot(entry);
  };

  const closeQuietly = async (agentId: AgentId, connection: MCPConnection): Promise<void> => {
    try {
      await connection.close();
    } catch (error: unknown) {
      logger.error('Error closing agent connection', {
        component: 'agent-connector',
        agentId,
        error: toError(error).message,
      });
    }
  };

  const watch = (entry: ConnectionEntry, connection: MCPConnection): void => {
    connection.onStatusChange((status) => {
      if (entries.get(entry.agentId) !== entry || entry.state !== 'ready') return;
      if (status === 'error') {
        logger.warn('Agent transport reported an error, session still open', {
          component: 'agent-connector',
          agentId: entry.agentId,
        });
        return;
      }
      if (status !== 'disconnected') return;

      transition(entry, 'disconnected');
      entry.connection = undefined;
      logger.warn('Agent dropped out of the registry', {
        component: 'agent-connector',
        agentId: entry.agentId,
        state: entry.state,
      });
      void closeQuietly(entry.agentId, connection);
    });
  };

  const connector: AgentConnector = {
    async connectAll(descriptors) {
      const statuses = await Promise.all(descriptors.map((d) => connector.connect(d)));

      const connected = statuses.filter((s) => s.state === 'ready').map((s) => s.agentId);
      const failed = statuses.filter((s) => s.state !== 'ready').map((s) => s.agentId);

      if (connected.length === 0) {
        logger.warn('No agents connected successfully', {
          component: 'agent-connector',
          attempted: descriptors.length,
        });
      } else {
        logger.info('Agent connector initialization complete', {
          component: 'agent-connector',
          connected,
          failed,
        });
      }

      return { connected, failed };
    },

    async connect(descriptor) {
      const existing = entries.get(descriptor.id);
      if (existing) {
        logger.warn('Agent already registered, skipping connect', {
          component: 'agent-connector',
          agentId: descriptor.id,
          state: existing.state,
        });
        return snapshot(existing);
      }

      const entry: ConnectionEntry = {
        agentId: descriptor.id,
        state: 'disconnected',
        capabilities: [...descriptor.capabilities],
      };
      entries.set(descriptor.id, entry);
      transition(entry, 'connecting');

      const target = resolveLaunchTarget(descriptor);
      if (target !== undefined && !(await pathExists(target))) {
        return fail(entry, `Launch target not found: ${target}`);
      }

      try {
        const connection = await createMCPConnection({ descriptor, timeoutMs, logger });
        if (entries.get(descriptor.id) !== entry) {
          // disconnectAll ran while this attempt was in flight.
          transition(entry, 'failed');
          entry.error = 'Connector shut down while connecting';
          logger.warn('Closing agent connected after shutdown', {
            component: 'agent-connector',
            agentId: descriptor.id,
          });
          await closeQuietly(descriptor.id, connection);
          return snapshot(entry);
        }
        entry.connection = connection;
        transition(entry, 'ready');
        watch(entry, connection);
        logger.info('Agent ready', {
          component: 'agent-connector',
          agentId: descriptor.id,
          capabilities: descriptor.capabilities,
        });
        return snapshot(entry);
      } catch (error: unknown) {
        return fail(entry, toError(error).message);
      }
    },

    async disconnectAll() {
      const live = [...entries.values()].filter(
        (entry): entry is ConnectionEntry & { connection: MCPConnection } =>
          entry.connection !== undefined,
      );

      const outcomes = await Promise.allSettled(
        live.map(async (entry) => {
          transition(entry, 'disconnected');
          const { connection } = entry;
          const record: ConnectionEntry = entry;
          record.connection = undefined;
          await connection.close();
        }),
      );

      outcomes.forEach((outcome, index) => {
        if (outcome.status === 'rejected') {
          logger.error('Error closing agent connection', {
            component: 'agent-connector',
            agentId: live[index]?.agentId,
            error: toError(outcome.reason).message,
          });
        }
      });

      entries.clear();
      logger.info('All agents disconnected', {
        component: 'agent-connector',
        closed: live.length,
      });
    },

    getProvider(agentId) {
      const entry = entries.get(agentId);
      return entry?.state === 'ready' ? entry.connection : undefined;
    },

    isReady(agentId) {
      return entries.get(agentId)?.state === 'ready';
    },

    listConnections() {
      return [...entries.values()].map(snapshot);
    },
  };

  return connector;
}
