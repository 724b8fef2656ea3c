// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a TaskId where a MessageId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type AgentId = Brand<string, 'AgentId'>;
export type SessionId = Brand<string, 'SessionId'>;
export type TraceId = Brand<string, 'TraceId'>;
export type MessageId = Brand<string, 'MessageId'>;
export type TaskId = Brand<string, 'TaskId'>;

/** Brand a configured agent identifier. */
export function toAgentId(value: string): AgentId {
  return value as AgentId;
}

export function toSessionId(value: string): SessionId {
  return value as SessionId;
}

export function toTraceId(value: string): TraceId {
  return value as TraceId;
}

export function toMessageId(value: string): MessageId {
  return value as MessageId;
}

export function toTaskId(value: string): TaskId {
  return value as TaskId;
}

// ─── Clock ──────────────────────────────────────────────────────

/** Time source, injectable so time-windowed reads are testable. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// ─── Prior Context ──────────────────────────────────────────────

/** One earlier message of the conversation the query belongs to (e.g. a Slack thread). */
export interface ThreadEntry {
  author: string;
  text: string;
}
