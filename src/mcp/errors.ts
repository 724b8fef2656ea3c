/**
 * Agent connection error classes.
 * All extend HuddleError for consistent error handling across the system.
 */
import { HuddleError } from '@/core/errors.js';

/** Thrown when connecting to an agent process fails. Non-fatal to the batch. */
export class AgentConnectionError extends HuddleError {
  constructor(agentId: string, message: string, cause?: Error) {
    super({
      message: `Agent "${agentId}" connection failed: ${message}`,
      code: 'AGENT_CONNECTION_ERROR',
      statusCode: 503,
      cause,
      context: { agentId },
    });
    this.name = 'AgentConnectionError';
  }
}

/** Thrown when an agent connection attempt exceeds its timeout. */
export class AgentTimeoutError extends HuddleError {
  constructor(agentId: string, operation: string, timeoutMs: number) {
    super({
      message: `Agent "${agentId}" timed out during ${operation} after ${timeoutMs}ms`,
      code: 'AGENT_TIMEOUT',
      statusCode: 504,
      context: { agentId, operation, timeoutMs },
    });
    this.name = 'AgentTimeoutError';
  }
}

/** Thrown when the connector is asked to perform an illegal state transition. */
export class ConnectionStateError extends HuddleError {
  constructor(agentId: string, from: string, to: string) {
    super({
      message: `Agent "${agentId}" cannot move from "${from}" to "${to}"`,
      code: 'CONNECTION_STATE_ERROR',
      statusCode: 500,
      context: { agentId, from, to },
      isOperational: false,
    });
    this.name = 'ConnectionStateError';
  }
}
