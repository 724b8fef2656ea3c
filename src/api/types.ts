import type { Coordinator } from '@/coordination/coordinator.js';
import type { AgentConnector } from '@/mcp/agent-connector.js';
import type { Logger } from '@/observability/logger.js';
import type { LocalAgent, Orchestrator } from '@/orchestration/orchestrator.js';
import type { MentionHandler } from '@/channels/slack/mention-handler.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies ─────────────────────────────────────────

export interface SlackRouteDependencies {
  mentionHandler: MentionHandler;
  /** Requests are unsigned-accepted when absent. */
  signingSecret?: string;
}

/** Dependencies injected into every route plugin. */
export interface RouteDependencies {
  orchestrator: Pick<Orchestrator, 'submit'>;
  connector: Pick<AgentConnector, 'listConnections'>;
  coordinator: Coordinator;
  localAgents: readonly LocalAgent[];
  slack?: SlackRouteDependencies;
  logger: Logger;
}
