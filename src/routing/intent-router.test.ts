import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import {
  huddleConfigFileSchema,
  routingConfigSchema,
  type RoutingConfig,
} from '@/config/schema.js';
import { analyzeIntent, scoreKeywords } from './intent-router.js';

function makeRouting(overrides?: Record<string, unknown>): RoutingConfig {
  return routingConfigSchema.parse({
    categories: [
      {
        name: 'github',
        agentId: 'github-agent',
        keywords: ['code', 'repository', 'pull request', 'commit'],
      },
      {
        name: 'jira',
        agentId: 'jira-agent',
        keywords: ['ticket', 'bug', 'priority', 'sync', 'sprint'],
      },
      {
        name: 'product_manager',
        agentId: 'pm-agent',
        keywords: ['roadmap', 'feature', 'sprint'],
      },
      {
        name: 'google_docs',
        agentId: 'docs-agent',
        keywords: ['document', 'docs'],
      },
    ],
    ...overrides,
  });
}

describe('scoreKeywords', () => {
  it('counts case-insensitive substring hits', () => {
    expect(scoreKeywords('Open a TICKET for the Bug', ['ticket', 'bug', 'sprint'])).toBe(2);
  });

  it('matches multi-word keywords', () => {
    expect(scoreKeywords('review the pull request please', ['pull request'])).toBe(1);
  });

  it('returns 0 when nothing matches', () => {
    expect(scoreKeywords('hello there', ['ticket'])).toBe(0);
  });
});

describe('analyzeIntent', () => {
  it('selects the ticket-tracking category for a bug triage query', () => {
    const analysis = analyzeIntent(
      'the rendering bug is high priority, can we sync the ticket?',
      makeRouting(),
    );

    expect(analysis.relevantAgents).toEqual(['jira-agent']);
    expect(analysis.scores).toEqual({ jira: 4 });
    expect(analysis.complexity).toBe('low');
  });

  it('orders agents by score and appends the coordinator', () => {
    const analysis = analyzeIntent(
      'write docs for the code in this repository and file a ticket',
      makeRouting(),
    );

    expect(analysis.scores).toEqual({ github: 2, jira: 1, google_docs: 1 });
    expect(analysis.relevantAgents).toEqual([
      'github-agent',
      'jira-agent',
      'docs-agent',
      'inter-agent-coordinator',
    ]);
    expect(analysis.complexity).toBe('high');
  });

  it('breaks ties by configuration order', () => {
    const analysis = analyzeIntent('plan the next sprint', makeRouting());

    expect(analysis.relevantAgents).toEqual(['jira-agent', 'pm-agent', 'inter-agent-coordinator']);
    expect(analysis.complexity).toBe('high');
  });

  it('falls back to the default agents when nothing scores', () => {
    const analysis = analyzeIntent('good morning', makeRouting());

    expect(analysis.relevantAgents).toEqual(['github-agent', 'jira-agent']);
    expect(analysis.scores).toEqual({});
    expect(analysis.complexity).toBe('medium');
  });

  it('uses the configured coordinator id', () => {
    const analysis = analyzeIntent(
      'commit the roadmap',
      makeRouting({ coordinatorAgentId: 'coordinator' }),
    );

    expect(analysis.relevantAgents).toEqual(['github-agent', 'pm-agent', 'coordinator']);
  });

  it('does not append the coordinator twice when it is itself a category', () => {
    const routing = routingConfigSchema.parse({
      categories: [
        { name: 'coordination', agentId: 'inter-agent-coordinator', keywords: ['workflow'] },
        { name: 'jira', agentId: 'jira-agent', keywords: ['ticket'] },
      ],
    });

    const analysis = analyzeIntent('start a workflow for this ticket', routing);

    expect(analysis.relevantAgents).toEqual(['inter-agent-coordinator', 'jira-agent']);
    expect(analysis.complexity).toBe('medium');
  });

  it('keeps the original query', () => {
    expect(analyzeIntent('Hi', makeRouting()).query).toBe('Hi');
  });
});

describe('analyzeIntent with the bundled configuration', () => {
  const bundled = huddleConfigFileSchema.parse(
    JSON.parse(readFileSync(new URL('../../config/huddle.json', import.meta.url), 'utf-8')),
  );

  it('routes a prioritization question to the product manager only', () => {
    const analysis = analyzeIntent('What is the priority of the roadmap items?', bundled.routing);

    expect(analysis.relevantAgents).toEqual(['product-manager-agent']);
    expect(analysis.scores).toEqual({ product_manager: 2 });
  });

  it('still routes pull request questions to github', () => {
    const analysis = analyzeIntent('Which pull request touched this?', bundled.routing);

    expect(analysis.relevantAgents).toEqual(['github-agent']);
  });
});
