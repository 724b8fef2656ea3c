export {
  createOrchestrator,
  NO_AGENTS_MESSAGE,
  ITERATION_LIMIT_MESSAGE,
  FAILURE_MESSAGE,
} from './orchestrator.js';
export type { LocalAgent, Orchestrator, OrchestratorOptions } from './orchestrator.js';
export {
  runOrchestrationLoop,
  DEFAULT_MAX_ITERATIONS,
  EMPTY_RESPONSE_FALLBACK,
} from './orchestration-loop.js';
export type { LoopOutcome, OrchestrationLoopParams } from './orchestration-loop.js';
export { buildSystemPrompt, buildContextMessage } from './prompt-builder.js';
export type { ContextMessageInput, PromptAgentSummary } from './prompt-builder.js';
