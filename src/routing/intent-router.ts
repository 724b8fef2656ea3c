/**
 * Keyword-based intent analysis: decides which agents a query should reach
 * before the model sees any tools.
 */
import type { AgentId } from '@/core/types.js';
import type { RoutingConfig } from '@/config/schema.js';

export type QueryComplexity = 'low' | 'medium' | 'high';

/** Outcome of analyzing one query. */
export interface IntentAnalysis {
  query: string;
  /** Agents to expose tools for, most relevant first. */
  relevantAgents: AgentId[];
  /** Keyword hits per scoring category, keyed by category name. */
  scores: Record<string, number>;
  complexity: QueryComplexity;
}

/**
 * Count how many of the keywords occur in the query (case-insensitive substring match).
 */
export function scoreKeywords(query: string, keywords: readonly string[]): number {
  const text = query.toLowerCase();
  return keywords.filter((keyword) => text.includes(keyword.toLowerCase())).length;
}

function complexityFor(agentCount: number): QueryComplexity {
  if (agentCount > 2) return 'high';
  if (agentCount > 1) return 'medium';
  return 'low';
}

/**
 * Select the agents relevant to a query.
 *
 * Scoring categories are ordered by descending score; ties keep configuration
 * order. When more than one agent is selected the coordinator joins them.
 * When nothing scores, the configured default agents are used.
 */
export function analyzeIntent(query: string, routing: RoutingConfig): IntentAnalysis {
  const scored = routing.categories
    .map((category, index) => ({
      category,
      index,
      score: scoreKeywords(query, category.keywords),
    }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index);

  const scores: Record<string, number> = {};
  for (const entry of scored) {
    scores[entry.category.name] = entry.score;
  }

  let relevantAgents: AgentId[] = scored.map((entry) => entry.category.agentId);
  if (relevantAgents.length === 0) {
    relevantAgents = [...routing.defaultAgents];
  } else if (relevantAgents.length > 1 && !relevantAgents.includes(routing.coordinatorAgentId)) {
    relevantAgents.push(routing.coordinatorAgentId);
  }

  return {
    query,
    relevantAgents,
    scores,
    complexity: complexityFor(relevantAgents.length),
  };
}
