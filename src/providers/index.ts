// Language model provider adapters
export type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  MessageContent,
  MessageRole,
  StopReason,
  TextContent,
  TokenUsage,
  ToolDefinitionForProvider,
  ToolResultContent,
  ToolUseContent,
} from './types.js';

export { createAnthropicProvider } from './anthropic.js';
export type { AnthropicProviderOptions } from './anthropic.js';
