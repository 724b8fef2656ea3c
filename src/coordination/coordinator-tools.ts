/**
 * Exposes a Coordinator as an agent: eight tools with Zod-validated input.
 * Invalid input and domain failures come back as error text, never as exceptions.
 */
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { AgentOperation, AgentToolProvider, OperationResult } from '@/agents/types.js';
import type { AgentId } from '@/core/types.js';
import { toAgentId } from '@/core/types.js';
import { coordinationRoleSchema } from '@/config/schema.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { Coordinator } from './coordinator.js';
import {
  formatCreatedTask,
  formatExchange,
  formatMessageList,
  formatMetrics,
  formatSentMessage,
  formatStatusUpdate,
  formatWorkflowRun,
  formatWorkloads,
} from './format.js';
import { messageTypeSchema, taskStatusSchema, WORKFLOW_TYPES } from './types.js';

const defaultLogger = createLogger({ name: 'coordinator-tools' });

export const DEFAULT_COORDINATOR_AGENT_ID = 'inter-agent-coordinator';

/** Roles that do work; the orchestrator only assigns it. */
const workerRoleSchema = coordinationRoleSchema.exclude(['orchestrator']);

// ─── Input Schemas ──────────────────────────────────────────────

const sendMessageInput = z.object({
  from_agent: coordinationRoleSchema.describe('Source agent'),
  to_agent: coordinationRoleSchema.describe('Target agent'),
  message_type: messageTypeSchema.describe('Type of message'),
  content: z.string().min(1).describe('Message content'),
  requires_response: z.boolean().default(false).describe('Whether this message requires a response'),
});

const createTaskInput = z.object({
  title: z.string().min(1).describe('Task title'),
  description: z.string().min(1).describe('Detailed task description'),
  assigned_agents: z.array(workerRoleSchema).min(1).describe('Agents assigned to this task'),
  dependencies: z.array(z.string()).default([]).describe('Ids of existing tasks this one depends on'),
});

const updateTaskStatusInput = z.object({
  task_id: z.string().min(1).describe('Task ID to update'),
  new_status: taskStatusSchema.describe('New task status'),
  agent: coordinationRoleSchema.describe('Agent updating the status'),
  results: z.record(z.string(), z.unknown()).optional().describe('Task results or additional data'),
});

const getMessagesInput = z.object({
  agent: coordinationRoleSchema.describe('Agent to get messages for'),
  unread_only: z.boolean().default(true).describe('Only return messages not read before'),
});

const simulateCommunicationInput = z.object({
  from_agent: workerRoleSchema.describe('Source agent'),
  to_agent: workerRoleSchema.describe('Target agent'),
  request: z.string().min(1).describe('Request to send to the target agent'),
});

const orchestrateWorkflowInput = z.object({
  workflow_type: z
    .string()
    .min(1)
    .describe(`Type of workflow to orchestrate: ${WORKFLOW_TYPES.join(', ')}`),
  parameters: z.record(z.string(), z.unknown()).default({}).describe('Workflow-specific parameters'),
});

const emptyInput = z.object({});

// ─── Tool Table ─────────────────────────────────────────────────

interface RegisteredTool {
  operation: AgentOperation;
  execute(args: Record<string, unknown>): OperationResult;
}

function toJsonSchema(schema: z.ZodType): Record<string, unknown> {
  const json = zodToJsonSchema(schema, { target: 'jsonSchema7' });
  return Object.fromEntries(Object.entries(json).filter(([key]) => key !== '$schema'));
}

function success(text: string): OperationResult {
  return { text, isError: false };
}

function failure(text: string): OperationResult {
  return { text, isError: true };
}

function defineTool<S extends z.ZodType>(
  name: string,
  description: string,
  schema: S,
  run: (input: z.output<S>) => OperationResult,
): RegisteredTool {
  return {
    operation: { name, description, inputSchema: toJsonSchema(schema) },
    execute(args) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(input)'}: ${issue.message}`)
          .join('; ');
        return failure(`Invalid input for ${name}: ${issues}`);
      }
      return run(parsed.data);
    },
  };
}

function buildTools(coordinator: Coordinator): RegisteredTool[] {
  return [
    defineTool('send_message', 'Send a message from one agent to another', sendMessageInput, (input) =>
      success(
        formatSentMessage(
          coordinator.send({
            from: input.from_agent,
            to: input.to_agent,
            type: input.message_type,
            content: input.content,
            requiresResponse: input.requires_response,
          }),
        ),
      ),
    ),

    defineTool(
      'create_task',
      'Create a multi-agent coordination task; every assigned agent receives a task assignment',
      createTaskInput,
      (input) => {
        const result = coordinator.createTask({
          title: input.title,
          description: input.description,
          assignedAgents: input.assigned_agents,
          dependencies: input.dependencies,
        });
        return result.ok
          ? success(formatCreatedTask(result.value))
          : failure(`Error: ${result.error.message}`);
      },
    ),

    defineTool(
      'update_task_status',
      'Update the status of a coordination task and notify the other assigned agents',
      updateTaskStatusInput,
      (input) => {
        const result = coordinator.updateStatus(
          input.task_id,
          input.new_status,
          input.agent,
          input.results,
        );
        return result.ok
          ? success(formatStatusUpdate(result.value, input.agent))
          : failure(`Error: ${result.error.message}`);
      },
    ),

    defineTool('get_messages', 'Get messages addressed to an agent', getMessagesInput, (input) =>
      success(
        formatMessageList(
          input.agent,
          coordinator.getMessages(input.agent, { unreadOnly: input.unread_only }),
          input.unread_only,
        ),
      ),
    ),

    defineTool(
      'simulate_communication',
      'Simulate a request/response exchange between two agents',
      simulateCommunicationInput,
      (input) =>
        success(
          formatExchange(
            coordinator.simulateCommunication(input.from_agent, input.to_agent, input.request),
          ),
        ),
    ),

    defineTool('get_workload', 'Get current workload and status for all agents', emptyInput, () =>
      success(formatWorkloads(coordinator.getAllWorkloads())),
    ),

    defineTool(
      'orchestrate_workflow',
      'Create the dependency-ordered tasks of a multi-agent workflow',
      orchestrateWorkflowInput,
      (input) => {
        const result = coordinator.orchestrateWorkflow(input.workflow_type, input.parameters);
        return result.ok
          ? success(formatWorkflowRun(result.value))
          : failure(`Error: ${result.error.message}`);
      },
    ),

    defineTool(
      'get_metrics',
      'Get metrics about inter-agent coordination and communication',
      emptyInput,
      () => success(formatMetrics(coordinator.getMetrics())),
    ),
  ];
}

export interface CoordinatorAgentOptions {
  agentId?: string;
  logger?: Logger;
}

/**
 * Wrap a coordinator in the agent operation contract so the orchestrator can
 * expose it to the model like any connected agent.
 */
export function createCoordinatorAgent(
  coordinator: Coordinator,
  options?: CoordinatorAgentOptions,
): AgentToolProvider {
  const agentId: AgentId = toAgentId(options?.agentId ?? DEFAULT_COORDINATOR_AGENT_ID);
  const logger = options?.logger ?? defaultLogger;
  const tools = new Map(
    buildTools(coordinator).map((tool): [string, RegisteredTool] => [tool.operation.name, tool]),
  );

  return {
    agentId,

    listOperations() {
      return Promise.resolve([...tools.values()].map((tool) => tool.operation));
    },

    invoke(name, args) {
      const tool = tools.get(name);
      if (!tool) {
        logger.warn('Unknown coordinator tool', { component: 'coordinator-tools', name });
        return Promise.resolve(failure(`Unknown tool: ${name}`));
      }
      const result = tool.execute(args);
      logger.debug('Coordinator tool invoked', {
        component: 'coordinator-tools',
        name,
        isError: result.isError,
      });
      return Promise.resolve(result);
    },
  };
}
