import { describe, it, expect } from 'vitest';
import { toAgentId } from '@/core/types.js';
import type { IntentAnalysis } from '@/routing/intent-router.js';
import { buildContextMessage, buildSystemPrompt } from './prompt-builder.js';

const analysis: IntentAnalysis = {
  query: 'What is blocking the sprint?',
  relevantAgents: [toAgentId('jira-agent'), toAgentId('pm-agent'), toAgentId('inter-agent-coordinator')],
  scores: { jira: 1, product_manager: 1 },
  complexity: 'high',
};

describe('buildSystemPrompt', () => {
  it('lists agents with their capabilities', () => {
    const prompt = buildSystemPrompt([
      { agentId: toAgentId('github-agent'), capabilities: ['code-analysis', 'pull-requests'] },
      { agentId: toAgentId('docs-agent'), capabilities: [] },
    ]);

    expect(prompt).toContain('Available agents:\n- github-agent: code-analysis, pull-requests\n- docs-agent\n');
  });

  it('names the coordination role of agents that have one', () => {
    const prompt = buildSystemPrompt([
      { agentId: toAgentId('jira-agent'), capabilities: ['tickets'], role: 'jira' },
      { agentId: toAgentId('pm-agent'), capabilities: [], role: 'product_manager' },
    ]);

    expect(prompt).toContain(
      'Available agents:\n- jira-agent (role: jira): tickets\n- pm-agent (role: product_manager)\n',
    );
    expect(prompt).toContain('6. In coordination tools, refer to an agent by its role.');
  });

  it('says so when there are no agents', () => {
    expect(buildSystemPrompt([])).toContain('Available agents:\n- (no agents configured)\n');
  });
});

describe('buildContextMessage', () => {
  it('includes the query, the analysis and the most recent thread entries', () => {
    const message = buildContextMessage({
      analysis,
      priorContext: [
        { author: 'ana', text: 'first' },
        { author: 'ben', text: 'second' },
        { author: 'ana', text: 'third' },
      ],
      limit: 2,
    });

    expect(message).toBe(
      [
        'User query: What is blocking the sprint?',
        '',
        'Analysis:',
        '- Complexity: high',
        '- Relevant agents: jira-agent, pm-agent, inter-agent-coordinator',
        '- Keyword scores: jira=1, product_manager=1',
        '',
        'Thread context:',
        'ben: second',
        'ana: third',
      ].join('\n'),
    );
  });

  it('notes an empty thread', () => {
    const message = buildContextMessage({
      analysis: { ...analysis, scores: {} },
      priorContext: [],
      limit: 5,
    });

    expect(message).toContain('- Keyword scores: none');
    expect(message.endsWith('Thread context:\nNo previous thread context.')).toBe(true);
  });

  it('drops the thread entirely when the limit is 0', () => {
    const message = buildContextMessage({
      analysis,
      priorContext: [{ author: 'ana', text: 'hello' }],
      limit: 0,
    });

    expect(message.endsWith('Thread context:\nNo previous thread context.')).toBe(true);
  });
});
