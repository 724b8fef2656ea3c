// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  sessionId?: string;
  traceId?: string;
  agentId?: string;
  component: string;
  [key: string]: unknown;
}
