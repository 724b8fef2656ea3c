/**
 * MCP (Model Context Protocol) connection types.
 * Each configured agent runs as an MCP server the connector talks to over stdio.
 */
import type { AgentToolProvider } from '@/agents/types.js';
import type { AgentId } from '@/core/types.js';

// ─── Connection State ──────────────────────────────────────────

/** Lifecycle state of one agent connection. */
export type AgentConnectionState = 'disconnected' | 'connecting' | 'ready' | 'failed';

/** Transitions the connector may perform. Anything else is a bug. */
export const ALLOWED_TRANSITIONS: Readonly<Record<AgentConnectionState, readonly AgentConnectionState[]>> = {
  disconnected: ['connecting'],
  connecting: ['ready', 'failed'],
  ready: ['disconnected'],
  failed: [],
};

// ─── Live Connection ───────────────────────────────────────────

/** Transport-level status reported by a live MCP connection. */
export type MCPTransportStatus = 'connected' | 'disconnected' | 'error';

/** A live MCP session with one agent process. */
export interface MCPConnection extends AgentToolProvider {
  readonly status: MCPTransportStatus;
  /** Registers a listener for transport close or error after the connection is up. */
  onStatusChange(listener: (status: MCPTransportStatus) => void): void;
  /** Close the session and terminate the agent process. */
  close(): Promise<void>;
}

// ─── Snapshots ─────────────────────────────────────────────────

/** Public view of one agent connection. */
export interface AgentConnectionStatus {
  agentId: AgentId;
  state: AgentConnectionState;
  capabilities: string[];
  error?: string;
}

/** Outcome of connecting a batch of agents. */
export interface ConnectSummary {
  connected: AgentId[];
  failed: AgentId[];
}
