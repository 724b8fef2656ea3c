/**
 * Inter-Agent Coordinator — an append-only message log and a task registry
 * shared by the coordination roles.
 *
 * Every operation is synchronous, so each mutation completes before any other
 * request is handled on the event loop.
 */
import type { CoordinationRole } from '@/agents/types.js';
import { COORDINATION_ROLES } from '@/agents/types.js';
import { UnknownTaskError, UnknownWorkflowError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { Clock, TaskId } from '@/core/types.js';
import { systemClock, toMessageId, toTaskId } from '@/core/types.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import { simulatedResponse } from './simulated-responses.js';
import type {
  AgentActivity,
  AgentMessage,
  CoordinationMetrics,
  CoordinationTask,
  CreateTaskInput,
  SendMessageInput,
  SimulatedExchange,
  TaskStatus,
  WorkflowRun,
  WorkloadSnapshot,
} from './types.js';
import { WORKFLOW_TYPES } from './types.js';
import { isWorkflowType, WORKFLOWS } from './workflows.js';

const defaultLogger = createLogger({ name: 'coordinator' });

/** Trailing window for the "recent messages" workload figure. */
export const DEFAULT_RECENT_WINDOW_MS = 24 * 60 * 60 * 1000;

export interface CoordinatorOptions {
  logger?: Logger;
  clock?: Clock;
  recentWindowMs?: number;
}

export interface GetMessagesOptions {
  /** Only messages the agent has not read yet, advancing its read cursor. Defaults to true. */
  unreadOnly?: boolean;
}

export interface Coordinator {
  send(input: SendMessageInput): AgentMessage;
  getMessages(agent: CoordinationRole, options?: GetMessagesOptions): AgentMessage[];
  createTask(input: CreateTaskInput): Result<CoordinationTask, UnknownTaskError>;
  updateStatus(
    taskId: string,
    status: TaskStatus,
    actingAgent: CoordinationRole,
    results?: Record<string, unknown>,
  ): Result<CoordinationTask, UnknownTaskError>;
  orchestrateWorkflow(
    workflowType: string,
    parameters?: Record<string, unknown>,
  ): Result<WorkflowRun, UnknownWorkflowError>;
  getWorkload(agent: CoordinationRole): WorkloadSnapshot;
  /** Workloads of every role except the orchestrator. */
  getAllWorkloads(): WorkloadSnapshot[];
  getMetrics(): CoordinationMetrics;
  simulateCommunication(
    from: CoordinationRole,
    to: CoordinationRole,
    request: string,
  ): SimulatedExchange;
  getTask(taskId: string): CoordinationTask | undefined;
  listTasks(): CoordinationTask[];
  listMessages(): AgentMessage[];
  /** Workflow runs with at least one task still pending or in progress. */
  listActiveWorkflows(): WorkflowRun[];
}

function formatId(prefix: string, n: number): string {
  return `${prefix}-${String(n).padStart(4, '0')}`;
}

function copyMessage(message: AgentMessage): AgentMessage {
  return { ...message, metadata: { ...message.metadata } };
}

function copyTask(task: CoordinationTask): CoordinationTask {
  return {
    ...task,
    assignedAgents: [...task.assignedAgents],
    dependencies: [...task.dependencies],
    results: { ...task.results },
  };
}

const OPEN_STATUSES: readonly TaskStatus[] = ['pending', 'in_progress'];

export function createCoordinator(options?: CoordinatorOptions): Coordinator {
  const logger = options?.logger ?? defaultLogger;
  const clock = options?.clock ?? systemClock;
  const recentWindowMs = options?.recentWindowMs ?? DEFAULT_RECENT_WINDOW_MS;

  const messages: AgentMessage[] = [];
  const tasks = new Map<TaskId, CoordinationTask>();
  const workflowRuns: Array<{ run: Omit<WorkflowRun, 'tasks'>; taskIds: TaskId[] }> = [];
  const readCursors = new Map<CoordinationRole, number>();
  let taskCounter = 0;

  const nextTaskId = (): TaskId => toTaskId(formatId('TASK', taskCounter + 1));

  const send = (input: SendMessageInput): AgentMessage => {
    const sequence = messages.length + 1;
    const message: AgentMessage = {
      id: toMessageId(formatId('MSG', sequence)),
      sequence,
      from: input.from,
      to: input.to,
      type: input.type,
      content: input.content,
      metadata: { ...input.metadata },
      timestamp: clock(),
      requiresResponse: input.requiresResponse ?? false,
      ...(input.parentId !== undefined && { parentId: input.parentId }),
    };
    messages.push(message);

    logger.debug('Message sent', {
      component: 'coordinator',
      messageId: message.id,
      from: message.from,
      to: message.to,
      type: message.type,
    });

    return copyMessage(message);
  };

  const createTask = (input: CreateTaskInput): Result<CoordinationTask, UnknownTaskError> => {
    const dependencies: TaskId[] = [];
    for (const dependency of input.dependencies ?? []) {
      const id = toTaskId(dependency);
      if (!tasks.has(id)) return err(new UnknownTaskError(dependency));
      dependencies.push(id);
    }

    taskCounter++;
    const now = clock();
    const task: CoordinationTask = {
      id: toTaskId(formatId('TASK', taskCounter)),
      title: input.title,
      description: input.description,
      assignedAgents: [...input.assignedAgents],
      status: 'pending',
      createdBy: input.createdBy ?? 'orchestrator',
      createdAt: now,
      updatedAt: now,
      dependencies,
      results: {},
    };
    tasks.set(task.id, task);

    for (const agent of task.assignedAgents) {
      send({
        from: 'orchestrator',
        to: agent,
        type: 'task_assignment',
        content: `New task assigned: ${task.title}`,
        metadata: {
          ...input.metadata,
          taskId: task.id,
          description: task.description,
          dependencies: [...dependencies],
        },
        requiresResponse: true,
      });
    }

    logger.info('Coordination task created', {
      component: 'coordinator',
      taskId: task.id,
      assignedAgents: task.assignedAgents,
      dependencies,
    });

    return ok(copyTask(task));
  };

  const getWorkload = (agent: CoordinationRole): WorkloadSnapshot => {
    const assigned = [...tasks.values()].filter((task) => task.assignedAgents.includes(agent));
    const count = (status: TaskStatus): number =>
      assigned.filter((task) => task.status === status).length;
    const pendingTasks = count('pending');
    const inProgressTasks = count('in_progress');
    const cutoff = clock().getTime() - recentWindowMs;

    return {
      agent,
      totalTasks: assigned.length,
      pendingTasks,
      inProgressTasks,
      completedTasks: count('completed'),
      recentMessages: messages.filter(
        (message) => message.to === agent && message.timestamp.getTime() > cutoff,
      ).length,
      workloadScore: pendingTasks * 2 + inProgressTasks * 3,
    };
  };

  const workflowView = (entry: (typeof workflowRuns)[number]): WorkflowRun => ({
    ...entry.run,
    parameters: { ...entry.run.parameters },
    tasks: entry.taskIds.flatMap((id) => {
      const task = tasks.get(id);
      return task ? [copyTask(task)] : [];
    }),
  });

  return {
    send,

    getMessages(agent, getOptions) {
      const unreadOnly = getOptions?.unreadOnly ?? true;
      const addressed = messages.filter((message) => message.to === agent);
      if (!unreadOnly) return addressed.map(copyMessage);

      const cursor = readCursors.get(agent) ?? 0;
      const unread = addressed.filter((message) => message.sequence > cursor);
      const newest = unread[unread.length - 1];
      if (newest) readCursors.set(agent, newest.sequence);
      return unread.map(copyMessage);
    },

    createTask,

    updateStatus(taskId, status, actingAgent, results) {
      const task = tasks.get(toTaskId(taskId));
      if (!task) return err(new UnknownTaskError(taskId));

      const oldStatus = task.status;
      task.status = status;
      task.updatedAt = clock();
      if (results) Object.assign(task.results, results);

      for (const agent of task.assignedAgents) {
        if (agent === actingAgent) continue;
        send({
          from: actingAgent,
          to: agent,
          type: 'status_update',
          content: `Task ${task.id} status changed: ${oldStatus} → ${status}`,
          metadata: {
            taskId: task.id,
            oldStatus,
            newStatus: status,
            updatedBy: actingAgent,
          },
        });
      }

      logger.info('Coordination task status changed', {
        component: 'coordinator',
        taskId: task.id,
        from: oldStatus,
        to: status,
        updatedBy: actingAgent,
      });

      return ok(copyTask(task));
    },

    orchestrateWorkflow(workflowType, parameters = {}) {
      if (!isWorkflowType(workflowType)) {
        logger.warn('Unknown workflow requested', { component: 'coordinator', workflowType });
        return err(new UnknownWorkflowError(workflowType, WORKFLOW_TYPES));
      }

      const definition = WORKFLOWS[workflowType];
      const created: CoordinationTask[] = [];
      for (const step of definition.steps) {
        const dependencies = step.dependsOn.flatMap((index) => {
          const predecessor = created[index];
          return predecessor ? [predecessor.id] : [];
        });
        const result = createTask({
          title: step.title,
          description: step.description,
          assignedAgents: [step.agent],
          dependencies,
          metadata: { workflowType },
        });
        // Dependencies always point at tasks created just above.
        if (!result.ok) throw result.error;
        created.push(result.value);
      }

      const entry = {
        run: { workflowType, parameters: { ...parameters }, startedAt: clock() },
        taskIds: created.map((task) => task.id),
      };
      workflowRuns.push(entry);

      logger.info('Workflow orchestrated', {
        component: 'coordinator',
        workflowType,
        taskIds: entry.taskIds,
      });

      return ok(workflowView(entry));
    },

    getWorkload,

    getAllWorkloads() {
      return COORDINATION_ROLES.filter((role) => role !== 'orchestrator').map(getWorkload);
    },

    getMetrics() {
      const messagesByType: CoordinationMetrics['messagesByType'] = {};
      for (const message of messages) {
        messagesByType[message.type] = (messagesByType[message.type] ?? 0) + 1;
      }

      const tasksByStatus: CoordinationMetrics['tasksByStatus'] = {};
      for (const task of tasks.values()) {
        tasksByStatus[task.status] = (tasksByStatus[task.status] ?? 0) + 1;
      }

      const agentActivity: CoordinationMetrics['agentActivity'] = {};
      for (const role of COORDINATION_ROLES) {
        if (role === 'orchestrator') continue;
        const sent = messages.filter((message) => message.from === role).length;
        const received = messages.filter((message) => message.to === role).length;
        const activity: AgentActivity = { sent, received, total: sent + received };
        agentActivity[role] = activity;
      }

      return {
        totalMessages: messages.length,
        totalTasks: tasks.size,
        messagesByType,
        tasksByStatus,
        agentActivity,
      };
    },

    simulateCommunication(from, to, request) {
      const requestMessage = send({
        from,
        to,
        type: 'request',
        content: request,
        requiresResponse: true,
      });
      const response = send({
        from: to,
        to: from,
        type: 'response',
        content: simulatedResponse(from, to, request, nextTaskId()),
        parentId: requestMessage.id,
      });
      return { request: requestMessage, response };
    },

    getTask(taskId) {
      const task = tasks.get(toTaskId(taskId));
      return task ? copyTask(task) : undefined;
    },

    listTasks() {
      return [...tasks.values()].map(copyTask);
    },

    listMessages() {
      return messages.map(copyMessage);
    },

    listActiveWorkflows() {
      return workflowRuns
        .filter((entry) =>
          entry.taskIds.some((id) => {
            const status = tasks.get(id)?.status;
            return status !== undefined && OPEN_STATUSES.includes(status);
          }),
        )
        .map(workflowView);
    },
  };
}

