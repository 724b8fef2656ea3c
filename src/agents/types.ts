/**
 * Agent contract types.
 *
 * Any subsystem that can list its operations and invoke them by name is an
 * agent: an MCP server reached over stdio, or an in-process provider such as
 * the coordinator tool surface.
 */
import type { AgentId } from '@/core/types.js';

// ─── Coordination Roles ──────────────────────────────────────────

/** Closed set of roles the coordinator tracks messages and tasks for. */
export const COORDINATION_ROLES = [
  'github',
  'jira',
  'product_manager',
  'google_docs',
  'orchestrator',
] as const;

export type CoordinationRole = (typeof COORDINATION_ROLES)[number];

// ─── Descriptor ──────────────────────────────────────────────────

/** Declarative description of one agent process, as read from configuration. */
export interface AgentDescriptor {
  id: AgentId;
  transport: 'stdio';
  /** Executable to spawn (e.g. "node", "python"). */
  command: string;
  args: string[];
  /** Child env var name → name of the orchestrator env var holding its value. */
  env: Record<string, string>;
  /** Free-form capability tags (e.g. "code-analysis", "sprint-tracking"). */
  capabilities: string[];
  /** Coordination role this agent acts as, when it takes part in workflows. */
  role?: CoordinationRole;
}

// ─── Operation Contract ──────────────────────────────────────────

/** A callable operation as reported by an agent. */
export interface AgentOperation {
  name: string;
  description: string;
  /** JSON Schema for the operation's arguments. */
  inputSchema: Record<string, unknown>;
}

/** Text outcome of invoking an operation. */
export interface OperationResult {
  text: string;
  isError: boolean;
}

/** The contract every agent fulfils, remote or in-process. */
export interface AgentToolProvider {
  readonly agentId: AgentId;
  listOperations(): Promise<AgentOperation[]>;
  invoke(name: string, args: Record<string, unknown>): Promise<OperationResult>;
}
