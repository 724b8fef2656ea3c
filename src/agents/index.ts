export type {
  AgentDescriptor,
  AgentOperation,
  AgentToolProvider,
  CoordinationRole,
  OperationResult,
} from './types.js';
export { COORDINATION_ROLES } from './types.js';
