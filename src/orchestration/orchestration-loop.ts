/**
 * The bounded model/tool-call loop.
 *
 * Each iteration is one model turn. A turn without tool calls ends the loop;
 * otherwise every tool call of the turn is dispatched concurrently and all
 * results go back to the model together, correlated by tool-use id.
 */
import type { ToolCatalog } from '@/catalog/tool-catalog.js';
import { IterationLimitExceededError, ModelError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok, toError } from '@/core/result.js';
import type { SessionId, TraceId } from '@/core/types.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type {
  LLMProvider,
  Message,
  MessageContent,
  TokenUsage,
  ToolResultContent,
} from '@/providers/types.js';

const defaultLogger = createLogger({ name: 'orchestration-loop' });

export const DEFAULT_MAX_ITERATIONS = 10;

export const EMPTY_RESPONSE_FALLBACK = "I couldn't generate a proper response.";

export interface OrchestrationLoopParams {
  provider: LLMProvider;
  catalog: ToolCatalog;
  systemPrompt: string;
  /** Conversation so far. The loop appends to a copy. */
  messages: readonly Message[];
  maxIterations?: number;
  maxOutputTokens: number;
  temperature: number;
  sessionId: SessionId;
  traceId?: TraceId;
  logger?: Logger;
}

export type LoopOutcome =
  | { status: 'done'; text: string; iterations: number; usage: TokenUsage; messages: Message[] }
  | {
      status: 'iteration_exceeded';
      iterations: number;
      usage: TokenUsage;
      error: IterationLimitExceededError;
    }
  | { status: 'errored'; iterations: number; usage: TokenUsage; error: ModelError };

interface ToolUse {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

interface ModelTurn {
  text: string;
  toolUses: ToolUse[];
  usage: TokenUsage;
}

function addUsage(total: TokenUsage, turn: TokenUsage): TokenUsage {
  return {
    inputTokens: total.inputTokens + turn.inputTokens,
    outputTokens: total.outputTokens + turn.outputTokens,
  };
}

async function runModelTurn(
  params: OrchestrationLoopParams,
  messages: Message[],
): Promise<Result<ModelTurn, ModelError>> {
  const { provider, catalog } = params;
  const tools = catalog.toToolDefinitions();

  try {
    const stream = provider.chat({
      messages,
      systemPrompt: params.systemPrompt,
      tools: tools.length > 0 ? tools : undefined,
      maxTokens: params.maxOutputTokens,
      temperature: params.temperature,
      traceId: params.traceId,
    });

    const textParts: string[] = [];
    const toolUses: ToolUse[] = [];
    let usage: TokenUsage | undefined;

    for await (const event of stream) {
      switch (event.type) {
        case 'content_delta':
          textParts.push(event.text);
          break;
        case 'tool_use_end':
          toolUses.push({ id: event.id, name: event.name, input: event.input });
          break;
        case 'message_end':
          usage = event.usage;
          break;
        case 'error':
          throw event.error;
      }
    }

    if (!usage) {
      return err(new ModelError(provider.id, 'stream ended without a stop reason'));
    }

    return ok({ text: textParts.join(''), toolUses, usage });
  } catch (error: unknown) {
    if (error instanceof ModelError) return err(error);
    const cause = toError(error);
    return err(new ModelError(provider.id, cause.message || 'unknown error', cause));
  }
}

async function dispatchToolCalls(
  catalog: ToolCatalog,
  toolUses: readonly ToolUse[],
): Promise<ToolResultContent[]> {
  return Promise.all(
    toolUses.map(async (toolUse): Promise<ToolResultContent> => {
      try {
        const outcome = await catalog.invoke(toolUse.name, toolUse.input);
        return {
          type: 'tool_result',
          toolUseId: toolUse.id,
          content: outcome.text,
          isError: outcome.isError,
        };
      } catch (error: unknown) {
        return {
          type: 'tool_result',
          toolUseId: toolUse.id,
          content: `Error: ${toError(error).message}`,
          isError: true,
        };
      }
    }),
  );
}

/**
 * Run model turns until the model answers without tool calls, or the turn budget runs out.
 */
export async function runOrchestrationLoop(params: OrchestrationLoopParams): Promise<LoopOutcome> {
  const logger = params.logger ?? defaultLogger;
  const maxIterations = params.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const messages: Message[] = [...params.messages];
  let usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;

    logger.debug('Model turn', {
      component: 'orchestration-loop',
      sessionId: params.sessionId,
      traceId: params.traceId,
      iteration: iterations,
      messageCount: messages.length,
    });

    const turn = await runModelTurn(params, messages);
    if (!turn.ok) {
      logger.error('Model turn failed', {
        component: 'orchestration-loop',
        sessionId: params.sessionId,
        iteration: iterations,
        error: turn.error.message,
      });
      return { status: 'errored', iterations, usage, error: turn.error };
    }

    usage = addUsage(usage, turn.value.usage);
    const { text, toolUses } = turn.value;

    if (toolUses.length === 0) {
      const finalText = text.trim().length > 0 ? text : EMPTY_RESPONSE_FALLBACK;
      messages.push({ role: 'assistant', content: finalText });
      logger.info('Orchestration complete', {
        component: 'orchestration-loop',
        sessionId: params.sessionId,
        iterations,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
      });
      return { status: 'done', text: finalText, iterations, usage, messages };
    }

    const assistantContent: MessageContent[] = [
      ...(text.trim().length > 0 ? [{ type: 'text' as const, text }] : []),
      ...toolUses.map((t) => ({ type: 'tool_use' as const, ...t })),
    ];
    messages.push({ role: 'assistant', content: assistantContent });

    logger.info('Dispatching tool calls', {
      component: 'orchestration-loop',
      sessionId: params.sessionId,
      iteration: iterations,
      tools: toolUses.map((t) => t.name),
    });

    const results = await dispatchToolCalls(params.catalog, toolUses);
    messages.push({ role: 'user', content: results });
  }

  const error = new IterationLimitExceededError(params.sessionId, maxIterations);
  logger.warn('Orchestration hit the iteration limit', {
    component: 'orchestration-loop',
    sessionId: params.sessionId,
    iterations,
  });
  return { status: 'iteration_exceeded', iterations, usage, error };
}
