/**
 * Scripted LLM provider for testing.
 * Each chat() call plays the next scripted turn; the last turn repeats once
 * the script runs out.
 */
import type { ChatEvent, ChatParams, LLMProvider, StopReason } from '@/providers/types.js';

/** One scripted model turn. */
export interface ScriptedTurn {
  text?: string;
  toolCalls?: Array<{ id: string; name: string; input: Record<string, unknown> }>;
  /** Emit a streamed error event instead of a response. */
  error?: Error;
  /** Throw from the stream instead of responding. */
  throws?: Error;
  stopReason?: StopReason;
}

export interface ScriptedLLMProvider extends LLMProvider {
  /** Parameters of every chat() call, with the message list copied at call time. */
  readonly calls: ChatParams[];
}

export function createScriptedLLMProvider(turns: ScriptedTurn[]): ScriptedLLMProvider {
  const calls: ChatParams[] = [];

  return {
    id: 'mock:scripted',
    displayName: 'Scripted Test Provider',
    calls,

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      const index = calls.length;
      calls.push({ ...params, messages: [...params.messages] });
      const turn = turns[Math.min(index, turns.length - 1)] ?? {};

      if (turn.throws) throw turn.throws;

      yield { type: 'message_start', messageId: `mock-msg-${index + 1}` };

      if (turn.error) {
        yield { type: 'error', error: turn.error };
        return;
      }

      if (turn.text !== undefined) {
        yield { type: 'content_delta', text: turn.text };
      }

      for (const call of turn.toolCalls ?? []) {
        yield { type: 'tool_use_start', id: call.id, name: call.name };
        yield { type: 'tool_use_end', id: call.id, name: call.name, input: call.input };
      }

      yield {
        type: 'message_end',
        stopReason: turn.stopReason ?? (turn.toolCalls?.length ? 'tool_use' : 'end_turn'),
        usage: { inputTokens: 10, outputTokens: 20 },
      };
    },
  };
}
