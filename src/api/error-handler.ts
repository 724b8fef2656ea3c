/**
 * Envelope helpers and the global error handler for the HTTP API.
 *
 * Operational HuddleErrors (unknown task, empty catalog, model failure) reach
 * the client with their code and context. Non-operational ones are bugs in
 * huddle-core itself and leave the server only as a bare 500.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { HuddleError } from '@/core/errors.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { ApiError, ApiResponse } from './types.js';

const defaultLogger = createLogger({ name: 'error-handler' });

// ─── Response Helpers ───────────────────────────────────────────

export async function sendSuccess(
  reply: FastifyReply,
  data: unknown,
  statusCode = 200,
): Promise<void> {
  const body: ApiResponse<unknown> = { success: true, data };
  await reply.status(statusCode).send(body);
}

export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiResponse<never> = {
    success: false,
    error: { code, message, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

/** 404 for a coordination resource looked up by id. */
export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Error Mapping ──────────────────────────────────────────────

/** How a thrown value is answered and how loudly it is logged. */
export interface ErrorResponse {
  statusCode: number;
  error: ApiError;
  severity: 'debug' | 'warn' | 'error';
}

const INTERNAL_ERROR: ApiError = {
  code: 'INTERNAL_ERROR',
  message: 'An unexpected error occurred',
};

const RATE_LIMIT_STATUS = 429;

/** Errors Fastify and its plugins raise for a bad request (invalid JSON, rate limit, media type). */
function requestErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if (!('statusCode' in error) || typeof error.statusCode !== 'number') return undefined;
  return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      severity: 'debug',
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request validation failed',
        details: {
          issues: error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        },
      },
    };
  }

  if (error instanceof HuddleError) {
    if (!error.isOperational) {
      return { statusCode: 500, severity: 'error', error: INTERNAL_ERROR };
    }
    return {
      statusCode: error.statusCode,
      severity: error.statusCode >= 500 ? 'error' : 'warn',
      error: {
        code: error.code,
        message: error.message,
        ...(error.context && { details: error.context }),
      },
    };
  }

  const status = requestErrorStatus(error);
  if (status !== undefined) {
    return {
      statusCode: status,
      severity: 'debug',
      error: {
        code: status === RATE_LIMIT_STATUS ? 'RATE_LIMITED' : 'BAD_REQUEST',
        message: messageOf(error),
      },
    };
  }

  return { statusCode: 500, severity: 'error', error: INTERNAL_ERROR };
}

// ─── Global Error Handler ───────────────────────────────────────

export function registerErrorHandler(fastify: FastifyInstance, logger: Logger = defaultLogger): void {
  fastify.setErrorHandler(async (error, request, reply) => {
    const response = toErrorResponse(error);

    logger[response.severity]('Request failed', {
      component: 'error-handler',
      method: request.method,
      url: request.url,
      statusCode: response.statusCode,
      code: response.error.code,
      error: messageOf(error),
      ...(response.severity === 'error' && error instanceof Error && { stack: error.stack }),
    });

    await reply.status(response.statusCode).send({ success: false, error: response.error });
  });
}
