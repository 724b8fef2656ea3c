import { describe, it, expect, vi } from 'vitest';
import type { AgentToolProvider } from '@/agents/types.js';
import { orchestrationConfigSchema, routingConfigSchema } from '@/config/schema.js';
import { toAgentId, type AgentId } from '@/core/types.js';
import { createFakeAgent } from '@/testing/helpers/fake-agent.js';
import { createScriptedLLMProvider, type ScriptedTurn } from '@/testing/helpers/test-llm-provider.js';
import {
  createOrchestrator,
  FAILURE_MESSAGE,
  ITERATION_LIMIT_MESSAGE,
  NO_AGENTS_MESSAGE,
  type LocalAgent,
} from './orchestrator.js';

const routing = routingConfigSchema.parse({
  categories: [
    { name: 'github', agentId: 'github-agent', keywords: ['code', 'pull request'] },
    { name: 'jira', agentId: 'jira-agent', keywords: ['ticket', 'bug'] },
  ],
});

const orchestration = orchestrationConfigSchema.parse({ threadContextLimit: 2 });

function setup(
  turns: ScriptedTurn[],
  agents: AgentToolProvider[],
  localAgents: LocalAgent[] = [],
): {
  orchestrator: ReturnType<typeof createOrchestrator>;
  provider: ReturnType<typeof createScriptedLLMProvider>;
  getProvider: ReturnType<typeof vi.fn>;
} {
  const provider = createScriptedLLMProvider(turns);
  const getProvider = vi.fn((id: AgentId) => agents.find((a) => a.agentId === id));
  const orchestrator = createOrchestrator({
    connector: { getProvider },
    provider,
    routing,
    orchestration,
    agents: [{ agentId: toAgentId('jira-agent'), capabilities: ['tickets'] }],
    localAgents,
  });
  return { orchestrator, provider, getProvider };
}

describe('createOrchestrator', () => {
  it('answers through the relevant agents', async () => {
    const jira = createFakeAgent('jira-agent', [
      { name: 'search', handler: () => ({ text: 'PROJ-9 login bug', isError: false }) },
    ]);
    const { orchestrator, provider } = setup(
      [
        { toolCalls: [{ id: 'tu_1', name: 'jira-agent_search', input: { q: 'bug' } }] },
        { text: 'PROJ-9 tracks the login bug.' },
      ],
      [jira],
    );

    await expect(orchestrator.submit('which ticket has the login bug?')).resolves.toBe(
      'PROJ-9 tracks the login bug.',
    );
    expect(provider.calls[0]?.tools?.map((t) => t.name)).toEqual(['jira-agent_search']);
    expect(provider.calls[0]?.systemPrompt).toContain('- jira-agent: tickets');
  });

  it('returns the no-agents message without calling the model when no agent is reachable', async () => {
    const { orchestrator, provider } = setup([{ text: 'should not be used' }], []);

    await expect(orchestrator.submit('review the code')).resolves.toBe(NO_AGENTS_MESSAGE);
    expect(provider.calls).toHaveLength(0);
  });

  it('returns the iteration message verbatim when the model never finishes', async () => {
    const github = createFakeAgent('github-agent', [{ name: 'search' }]);
    const { orchestrator, provider } = setup(
      [
        {
          text: 'partial thoughts',
          toolCalls: [{ id: 'tu_x', name: 'github-agent_search', input: {} }],
        },
      ],
      [github],
    );

    await expect(orchestrator.submit('look at the code')).resolves.toBe(ITERATION_LIMIT_MESSAGE);
    expect(provider.calls).toHaveLength(10);
  });

  it('returns the apology when the model fails', async () => {
    const github = createFakeAgent('github-agent', [{ name: 'search' }]);
    const { orchestrator } = setup([{ error: new Error('overloaded') }], [github]);

    await expect(orchestrator.submit('look at the code')).resolves.toBe(FAILURE_MESSAGE);
  });

  it('never rejects, even when agent lookup throws', async () => {
    const { orchestrator, getProvider } = setup([{ text: 'x' }], []);
    getProvider.mockImplementation(() => {
      throw new Error('registry corrupted');
    });

    await expect(orchestrator.submit('look at the code')).resolves.toBe(FAILURE_MESSAGE);
  });

  it('prefers local agents and lists them in the system prompt', async () => {
    const coordinator = createFakeAgent('inter-agent-coordinator', [{ name: 'get_metrics' }]);
    const github = createFakeAgent('github-agent', [{ name: 'search' }]);
    const jira = createFakeAgent('jira-agent', [{ name: 'search' }]);
    const { orchestrator, provider, getProvider } = setup(
      [{ text: 'Both agents are idle.' }],
      [github, jira],
      [{ provider: coordinator, capabilities: ['workflows'] }],
    );

    await orchestrator.submit('is the pull request linked to the ticket?');

    expect(provider.calls[0]?.tools?.map((t) => t.name)).toEqual([
      'github-agent_search',
      'jira-agent_search',
      'inter-agent-coordinator_get_metrics',
    ]);
    expect(provider.calls[0]?.systemPrompt).toContain('- inter-agent-coordinator: workflows');
    expect(getProvider).not.toHaveBeenCalledWith('inter-agent-coordinator');
  });

  it('passes the tail of the thread to the model', async () => {
    const jira = createFakeAgent('jira-agent', [{ name: 'search' }]);
    const { orchestrator, provider } = setup([{ text: 'ok' }], [jira]);

    await orchestrator.submit('any bug updates?', [
      { author: 'ana', text: 'one' },
      { author: 'ben', text: 'two' },
      { author: 'cy', text: 'three' },
    ]);

    const first = provider.calls[0]?.messages[0];
    expect(first?.role).toBe('user');
    expect(typeof first?.content === 'string' && first.content.endsWith('Thread context:\nben: two\ncy: three')).toBe(
      true,
    );
  });
});
