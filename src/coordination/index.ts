// Inter-agent coordination: message log, task registry and workflows
export { createCoordinator, DEFAULT_RECENT_WINDOW_MS } from './coordinator.js';
export type { Coordinator, CoordinatorOptions, GetMessagesOptions } from './coordinator.js';
export { createCoordinatorAgent, DEFAULT_COORDINATOR_AGENT_ID } from './coordinator-tools.js';
export type { CoordinatorAgentOptions } from './coordinator-tools.js';
export { WORKFLOWS, isWorkflowType } from './workflows.js';
export type { WorkflowDefinition, WorkflowStep } from './workflows.js';
export { simulatedResponse } from './simulated-responses.js';
export {
  MESSAGE_TYPES,
  TASK_STATUSES,
  WORKFLOW_TYPES,
  messageTypeSchema,
  taskStatusSchema,
} from './types.js';
export type {
  AgentActivity,
  AgentMessage,
  CoordinationMetrics,
  CoordinationTask,
  CreateTaskInput,
  MessageType,
  SendMessageInput,
  SimulatedExchange,
  TaskStatus,
  WorkflowRun,
  WorkflowType,
  WorkloadSnapshot,
} from './types.js';
