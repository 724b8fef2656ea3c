/**
 * Inter-agent coordination types: messages, tasks and the views derived from them.
 */
import { z } from 'zod';
import type { CoordinationRole } from '@/agents/types.js';
import type { MessageId, TaskId } from '@/core/types.js';

// ─── Enumerations ───────────────────────────────────────────────

export const MESSAGE_TYPES = [
  'request',
  'response',
  'notification',
  'task_assignment',
  'status_update',
] as const;

export const messageTypeSchema = z.enum(MESSAGE_TYPES);
export type MessageType = z.infer<typeof messageTypeSchema>;

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'failed', 'cancelled'] as const;

export const taskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof taskStatusSchema>;

export const WORKFLOW_TYPES = [
  'technical_debt_analysis',
  'sprint_planning',
  'bug_investigation',
  'feature_planning',
] as const;

export type WorkflowType = (typeof WORKFLOW_TYPES)[number];

// ─── Messages ───────────────────────────────────────────────────

export interface AgentMessage {
  id: MessageId;
  /** Position in the global message log, starting at 1. */
  sequence: number;
  from: CoordinationRole;
  to: CoordinationRole;
  type: MessageType;
  content: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
  requiresResponse: boolean;
  parentId?: MessageId;
}

export interface SendMessageInput {
  from: CoordinationRole;
  to: CoordinationRole;
  type: MessageType;
  content: string;
  metadata?: Record<string, unknown>;
  requiresResponse?: boolean;
  parentId?: MessageId;
}

// ─── Tasks ──────────────────────────────────────────────────────

export interface CoordinationTask {
  id: TaskId;
  title: string;
  description: string;
  assignedAgents: CoordinationRole[];
  status: TaskStatus;
  createdBy: CoordinationRole;
  createdAt: Date;
  updatedAt: Date;
  /** Ids of tasks that existed when this one was created. */
  dependencies: TaskId[];
  results: Record<string, unknown>;
}

export interface CreateTaskInput {
  title: string;
  description: string;
  assignedAgents: CoordinationRole[];
  /** Defaults to `orchestrator`. */
  createdBy?: CoordinationRole;
  dependencies?: readonly string[];
  /** Extra fields carried on each task assignment message. */
  metadata?: Record<string, unknown>;
}

// ─── Derived Views ──────────────────────────────────────────────

export interface WorkloadSnapshot {
  agent: CoordinationRole;
  totalTasks: number;
  pendingTasks: number;
  inProgressTasks: number;
  completedTasks: number;
  /** Messages addressed to the agent within the recent window. */
  recentMessages: number;
  workloadScore: number;
}

export interface AgentActivity {
  sent: number;
  received: number;
  total: number;
}

export interface CoordinationMetrics {
  totalMessages: number;
  totalTasks: number;
  messagesByType: Partial<Record<MessageType, number>>;
  tasksByStatus: Partial<Record<TaskStatus, number>>;
  /** Per role, orchestrator excluded. */
  agentActivity: Partial<Record<CoordinationRole, AgentActivity>>;
}

export interface WorkflowRun {
  workflowType: WorkflowType;
  tasks: CoordinationTask[];
  parameters: Record<string, unknown>;
  startedAt: Date;
}

export interface SimulatedExchange {
  request: AgentMessage;
  response: AgentMessage;
}
