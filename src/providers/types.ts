import type { TraceId } from '@/core/types.js';

// ─── Messages ───────────────────────────────────────────────────

/** Tool results travel back to the model inside a `user` turn. */
export type MessageRole = 'user' | 'assistant';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolUseContent {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultContent {
  type: 'tool_result';
  toolUseId: string;
  content: string;
  isError?: boolean;
}

export type MessageContent = TextContent | ToolUseContent | ToolResultContent;

export interface Message {
  role: MessageRole;
  content: string | MessageContent[];
}

// ─── Chat Parameters ────────────────────────────────────────────

export interface ToolDefinitionForProvider {
  name: string;
  description: string;
  /** JSON Schema of the tool arguments. */
  inputSchema: Record<string, unknown>;
}

export interface ChatParams {
  messages: Message[];
  systemPrompt?: string;
  tools?: ToolDefinitionForProvider[];
  maxTokens: number;
  temperature: number;
  traceId?: TraceId;
}

// ─── Streaming Events ───────────────────────────────────────────

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens?: number;
  cacheWriteTokens?: number;
}

export type ChatEvent =
  | { type: 'message_start'; messageId: string }
  | { type: 'content_delta'; text: string }
  | { type: 'tool_use_start'; id: string; name: string }
  | { type: 'tool_use_end'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'message_end'; stopReason: StopReason; usage: TokenUsage }
  | { type: 'error'; error: Error };

// ─── Provider Interface ─────────────────────────────────────────

export interface LLMProvider {
  readonly id: string;
  readonly displayName: string;

  /** Stream one model turn. */
  chat(params: ChatParams): AsyncGenerator<ChatEvent>;
}
