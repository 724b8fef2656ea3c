/**
 * Anthropic LLM provider adapter.
 * Wraps the @anthropic-ai/sdk streaming API behind the LLMProvider interface.
 */
import Anthropic from '@anthropic-ai/sdk';

import { ModelError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  StopReason,
  ToolDefinitionForProvider,
} from './types.js';

const logger = createLogger({ name: 'anthropic-provider' });

/** Configuration for the Anthropic provider. */
export interface AnthropicProviderOptions {
  apiKey: string;
  /** Model identifier (e.g. 'claude-sonnet-4-5-20250929'). */
  model: string;
  /** Custom base URL (for proxies). */
  baseUrl?: string;
}

/**
 * Convert our internal Message format to Anthropic's API format.
 */
function toAnthropicMessages(messages: Message[]): Anthropic.Messages.MessageParam[] {
  return messages.map((msg): Anthropic.Messages.MessageParam => {
    if (typeof msg.content === 'string') {
      return { role: msg.role, content: msg.content };
    }

    const blocks = msg.content.map((part): Anthropic.Messages.ContentBlockParam => {
      switch (part.type) {
        case 'text':
          return { type: 'text', text: part.text };
        case 'tool_use':
          return { type: 'tool_use', id: part.id, name: part.name, input: part.input };
        case 'tool_result':
          return {
            type: 'tool_result',
            tool_use_id: part.toolUseId,
            content: part.content,
            is_error: part.isError ?? false,
          };
      }
    });

    return { role: msg.role, content: blocks };
  });
}

/**
 * Format tool definitions for the Anthropic API.
 */
export function toAnthropicTools(tools: ToolDefinitionForProvider[]): Anthropic.Messages.Tool[] {
  return tools.map((t): Anthropic.Messages.Tool => ({
    name: t.name,
    description: t.description,
    input_schema: { ...t.inputSchema, type: 'object' },
  }));
}

function toStopReason(reason: string | null): StopReason {
  switch (reason) {
    case 'tool_use':
    case 'max_tokens':
    case 'stop_sequence':
      return reason;
    default:
      return 'end_turn';
  }
}

function parseToolInput(json: string): Record<string, unknown> | undefined {
  const parsed: unknown = JSON.parse(json || '{}');
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Anthropic provider implementing the LLMProvider interface.
 */
export function createAnthropicProvider(options: AnthropicProviderOptions): LLMProvider {
  const client = new Anthropic({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  return {
    id: `anthropic:${options.model}`,
    displayName: `Anthropic ${options.model}`,

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      const anthropicMessages = toAnthropicMessages(params.messages);
      const tools = params.tools?.length ? toAnthropicTools(params.tools) : undefined;

      logger.debug('Starting Anthropic chat stream', {
        component: 'anthropic',
        model: options.model,
        messageCount: anthropicMessages.length,
        toolCount: tools?.length ?? 0,
        traceId: params.traceId,
      });

      try {
        const stream = client.messages.stream({
          model: options.model,
          messages: anthropicMessages,
          max_tokens: params.maxTokens,
          temperature: params.temperature,
          ...(params.systemPrompt ? { system: params.systemPrompt } : {}),
          ...(tools ? { tools } : {}),
        });

        let currentToolId: string | undefined;
        let currentToolName = '';
        let toolInputJson = '';

        for await (const event of stream) {
          switch (event.type) {
            case 'message_start':
              yield { type: 'message_start', messageId: event.message.id };
              break;

            case 'content_block_start':
              if (event.content_block.type === 'tool_use') {
                currentToolId = event.content_block.id;
                currentToolName = event.content_block.name;
                toolInputJson = '';
                yield { type: 'tool_use_start', id: currentToolId, name: currentToolName };
              }
              break;

            case 'content_block_delta':
              if (event.delta.type === 'text_delta') {
                yield { type: 'content_delta', text: event.delta.text };
              } else if (event.delta.type === 'input_json_delta') {
                toolInputJson += event.delta.partial_json;
              }
              break;

            case 'content_block_stop':
              if (currentToolId) {
                let input: Record<string, unknown> | undefined;
                try {
                  input = parseToolInput(toolInputJson);
                } catch {
                  input = undefined;
                }
                if (!input) {
                  logger.warn('Tool input is not a JSON object, using {}', {
                    component: 'anthropic',
                    toolId: currentToolId,
                    toolName: currentToolName,
                  });
                }
                yield {
                  type: 'tool_use_end',
                  id: currentToolId,
                  name: currentToolName,
                  input: input ?? {},
                };
                currentToolId = undefined;
                currentToolName = '';
                toolInputJson = '';
              }
              break;

            case 'message_stop': {
              const finalMessage = await stream.finalMessage();
              yield {
                type: 'message_end',
                stopReason: toStopReason(finalMessage.stop_reason),
                usage: {
                  inputTokens: finalMessage.usage.input_tokens,
                  outputTokens: finalMessage.usage.output_tokens,
                  cacheReadTokens: finalMessage.usage.cache_read_input_tokens ?? undefined,
                  cacheWriteTokens: finalMessage.usage.cache_creation_input_tokens ?? undefined,
                },
              };
              break;
            }
          }
        }
      } catch (error) {
        if (error instanceof Anthropic.APIError) {
          logger.error('Anthropic API error', {
            component: 'anthropic',
            status: error.status,
            errorMessage: error.message,
            traceId: params.traceId,
          });
          yield {
            type: 'error',
            error: new ModelError('anthropic', `${String(error.status)}: ${error.message}`, error),
          };
        } else {
          throw error;
        }
      }
    },
  };
}
