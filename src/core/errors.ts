/**
 * Base error class for all huddle-core errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class HuddleError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'HuddleError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when the configuration file or environment cannot be loaded or validated. */
export class ConfigurationError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIGURATION_ERROR',
      statusCode: 500,
      context,
    });
    this.name = 'ConfigurationError';
  }
}

/** Thrown when the catalog for a query ends up without any tool. */
export class CatalogError extends HuddleError {
  constructor(agentIds: readonly string[]) {
    super({
      message: `No tools available from agents: ${agentIds.length > 0 ? agentIds.join(', ') : '(none)'}`,
      code: 'CATALOG_EMPTY',
      statusCode: 503,
      context: { agentIds },
    });
    this.name = 'CatalogError';
  }
}

/** Raised for a single failed tool call. Converted to tool-result text by the loop. */
export class ToolInvocationError extends HuddleError {
  constructor(qualifiedName: string, message: string, cause?: Error) {
    super({
      message: `Tool "${qualifiedName}" failed: ${message}`,
      code: 'TOOL_INVOCATION_ERROR',
      statusCode: 502,
      cause,
      context: { qualifiedName },
    });
    this.name = 'ToolInvocationError';
  }
}

/** Thrown when a call to the language model fails. */
export class ModelError extends HuddleError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `Model provider "${provider}" error: ${message}`,
      code: 'MODEL_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ModelError';
  }
}

/** Raised when the orchestration loop runs out of model turns. */
export class IterationLimitExceededError extends HuddleError {
  constructor(sessionId: string, limit: number) {
    super({
      message: `Orchestration session ${sessionId} exceeded ${limit} model turns`,
      code: 'ITERATION_LIMIT_EXCEEDED',
      statusCode: 422,
      context: { sessionId, limit },
    });
    this.name = 'IterationLimitExceededError';
  }
}

/** Returned when a workflow type has no definition. */
export class UnknownWorkflowError extends HuddleError {
  constructor(workflowType: string, available: readonly string[]) {
    super({
      message: `Workflow type "${workflowType}" is not supported. Available workflows: ${available.join(', ')}`,
      code: 'UNKNOWN_WORKFLOW',
      statusCode: 404,
      context: { workflowType, available },
    });
    this.name = 'UnknownWorkflowError';
  }
}

/** Returned when a coordination task id does not exist. */
export class UnknownTaskError extends HuddleError {
  constructor(taskId: string) {
    super({
      message: `Task ${taskId} not found`,
      code: 'UNKNOWN_TASK',
      statusCode: 404,
      context: { taskId },
    });
    this.name = 'UnknownTaskError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}
