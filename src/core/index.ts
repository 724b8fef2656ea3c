// Core module — shared types, errors and the Result type
export type {
  AgentId,
  Clock,
  MessageId,
  SessionId,
  TaskId,
  ThreadEntry,
  TraceId,
} from './types.js';
export {
  systemClock,
  toAgentId,
  toMessageId,
  toSessionId,
  toTaskId,
  toTraceId,
} from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, unwrap, toError } from './result.js';

export {
  HuddleError,
  ConfigurationError,
  CatalogError,
  ToolInvocationError,
  ModelError,
  IterationLimitExceededError,
  UnknownWorkflowError,
  UnknownTaskError,
  ValidationError,
} from './errors.js';
