/**
 * Builds the system prompt and the per-query context message the model starts from.
 */
import type { CoordinationRole } from '@/agents/types.js';
import type { AgentId, ThreadEntry } from '@/core/types.js';
import type { IntentAnalysis } from '@/routing/intent-router.js';

/** An agent as described to the model. */
export interface PromptAgentSummary {
  agentId: AgentId;
  capabilities: readonly string[];
  /** Role to use for this agent in coordinator tool calls. */
  role?: CoordinationRole;
}

function describeAgent(agent: PromptAgentSummary): string {
  const name = agent.role ? `${agent.agentId} (role: ${agent.role})` : agent.agentId;
  return agent.capabilities.length > 0 ? `- ${name}: ${agent.capabilities.join(', ')}` : `- ${name}`;
}

export function buildSystemPrompt(agents: readonly PromptAgentSummary[]): string {
  const agentLines =
    agents.length > 0
      ? agents.map(describeAgent)
      : ['- (no agents configured)'];

  return [
    'You are Huddle, an assistant that answers project questions by orchestrating specialized agents.',
    '',
    'Available agents:',
    ...agentLines,
    '',
    'Instructions:',
    '1. Use the agent tools to gather the information the question needs.',
    '2. For questions that span several agents, coordinate them through the coordinator tools.',
    '3. Give insights and analysis rather than raw data.',
    '4. Be conversational and concise.',
    '5. When one agent needs data from another, use the coordination tools to request it.',
    '6. In coordination tools, refer to an agent by its role.',
  ].join('\n');
}

export interface ContextMessageInput {
  analysis: IntentAnalysis;
  priorContext: readonly ThreadEntry[];
  /** How many of the most recent prior entries to include. */
  limit: number;
}

function formatScores(scores: Record<string, number>): string {
  const entries = Object.entries(scores);
  if (entries.length === 0) return 'none';
  return entries.map(([name, score]) => `${name}=${score}`).join(', ');
}

/**
 * The first user turn: the query, the routing analysis and the tail of the thread.
 */
export function buildContextMessage(input: ContextMessageInput): string {
  const { analysis, priorContext, limit } = input;
  const recent = limit > 0 ? priorContext.slice(-limit) : [];

  const lines = [
    `User query: ${analysis.query}`,
    '',
    'Analysis:',
    `- Complexity: ${analysis.complexity}`,
    `- Relevant agents: ${analysis.relevantAgents.join(', ')}`,
    `- Keyword scores: ${formatScores(analysis.scores)}`,
    '',
    'Thread context:',
  ];

  if (recent.length === 0) {
    lines.push('No previous thread context.');
  } else {
    for (const entry of recent) {
      lines.push(`${entry.author}: ${entry.text}`);
    }
  }

  return lines.join('\n');
}
