import { describe, it, expect, beforeEach } from 'vitest';
import { UnknownTaskError, UnknownWorkflowError } from '@/core/errors.js';
import { createCoordinator, type Coordinator } from './coordinator.js';

// ─── Helpers ────────────────────────────────────────────────────

const START = new Date('2026-03-02T09:00:00.000Z');
const HOUR = 60 * 60 * 1000;

let now: Date;
let coordinator: Coordinator;

function advance(ms: number): void {
  now = new Date(now.getTime() + ms);
}

beforeEach(() => {
  now = START;
  coordinator = createCoordinator({ clock: () => now });
});

// ─── Messages ───────────────────────────────────────────────────

describe('send', () => {
  it('assigns sequential ids and timestamps', () => {
    const first = coordinator.send({ from: 'github', to: 'jira', type: 'request', content: 'a' });
    advance(1000);
    const second = coordinator.send({
      from: 'jira',
      to: 'github',
      type: 'response',
      content: 'b',
      parentId: first.id,
    });

    expect(first).toEqual({
      id: 'MSG-0001',
      sequence: 1,
      from: 'github',
      to: 'jira',
      type: 'request',
      content: 'a',
      metadata: {},
      timestamp: START,
      requiresResponse: false,
    });
    expect(second.id).toBe('MSG-0002');
    expect(second.parentId).toBe('MSG-0001');
    expect(second.timestamp).toEqual(new Date('2026-03-02T09:00:01.000Z'));
  });
});

describe('getMessages', () => {
  it('returns unread messages once and advances the read cursor', () => {
    coordinator.send({ from: 'github', to: 'jira', type: 'request', content: 'one' });
    coordinator.send({ from: 'product_manager', to: 'jira', type: 'notification', content: 'two' });
    coordinator.send({ from: 'jira', to: 'github', type: 'response', content: 'other' });

    expect(coordinator.getMessages('jira').map((m) => m.content)).toEqual(['one', 'two']);
    expect(coordinator.getMessages('jira')).toEqual([]);

    coordinator.send({ from: 'github', to: 'jira', type: 'request', content: 'three' });
    expect(coordinator.getMessages('jira').map((m) => m.content)).toEqual(['three']);
  });

  it('returns everything without moving the cursor when unreadOnly is false', () => {
    coordinator.send({ from: 'github', to: 'jira', type: 'request', content: 'one' });

    expect(coordinator.getMessages('jira', { unreadOnly: false })).toHaveLength(1);
    expect(coordinator.getMessages('jira', { unreadOnly: false })).toHaveLength(1);
    expect(coordinator.getMessages('jira')).toHaveLength(1);
  });

  it('keeps read cursors per agent', () => {
    coordinator.send({ from: 'orchestrator', to: 'jira', type: 'notification', content: 'j' });
    coordinator.send({ from: 'orchestrator', to: 'github', type: 'notification', content: 'g' });

    coordinator.getMessages('jira');

    expect(coordinator.getMessages('github').map((m) => m.content)).toEqual(['g']);
  });
});

// ─── Tasks ──────────────────────────────────────────────────────

describe('createTask', () => {
  it('creates a pending task and sends one assignment per assigned agent', () => {
    const result = coordinator.createTask({
      title: 'Audit login flow',
      description: 'Check session handling',
      assignedAgents: ['github', 'jira'],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      id: 'TASK-0001',
      title: 'Audit login flow',
      description: 'Check session handling',
      assignedAgents: ['github', 'jira'],
      status: 'pending',
      createdBy: 'orchestrator',
      createdAt: START,
      updatedAt: START,
      dependencies: [],
      results: {},
    });

    const assignments = coordinator.listMessages();
    expect(assignments.map((m) => [m.to, m.type, m.requiresResponse])).toEqual([
      ['github', 'task_assignment', true],
      ['jira', 'task_assignment', true],
    ]);
    expect(assignments[0]?.content).toBe('New task assigned: Audit login flow');
    expect(assignments[0]?.metadata).toEqual({
      taskId: 'TASK-0001',
      description: 'Check session handling',
      dependencies: [],
    });
  });

  it('rejects dependencies on tasks that do not exist', () => {
    const result = coordinator.createTask({
      title: 'Orphan',
      description: 'Depends on nothing real',
      assignedAgents: ['jira'],
      dependencies: ['TASK-0099'],
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownTaskError);
    expect(result.error.message).toBe('Task TASK-0099 not found');
    expect(coordinator.listTasks()).toEqual([]);
    expect(coordinator.listMessages()).toEqual([]);
  });

  it('hands out copies that do not alias internal state', () => {
    const result = coordinator.createTask({
      title: 'T',
      description: 'D',
      assignedAgents: ['jira'],
    });
    if (!result.ok) throw result.error;

    result.value.assignedAgents.push('github');
    result.value.status = 'completed';

    expect(coordinator.getTask('TASK-0001')).toMatchObject({
      assignedAgents: ['jira'],
      status: 'pending',
    });
  });
});

describe('updateStatus', () => {
  it('notifies the other assigned agents and merges results', () => {
    coordinator.createTask({ title: 'T', description: 'D', assignedAgents: ['github', 'jira'] });
    advance(5000);

    const result = coordinator.updateStatus('TASK-0001', 'in_progress', 'github', { branch: 'fix/login' });

    expect(result.ok && result.value.status).toBe('in_progress');
    expect(result.ok && result.value.results).toEqual({ branch: 'fix/login' });
    expect(result.ok && result.value.updatedAt).toEqual(new Date('2026-03-02T09:00:05.000Z'));

    const updates = coordinator.listMessages().filter((m) => m.type === 'status_update');
    expect(updates).toHaveLength(1);
    expect(updates[0]).toMatchObject({
      from: 'github',
      to: 'jira',
      content: 'Task TASK-0001 status changed: pending → in_progress',
      metadata: {
        taskId: 'TASK-0001',
        oldStatus: 'pending',
        newStatus: 'in_progress',
        updatedBy: 'github',
      },
    });
  });

  it('sends assignments before any status update for the task', () => {
    coordinator.createTask({ title: 'T', description: 'D', assignedAgents: ['github', 'jira'] });
    coordinator.updateStatus('TASK-0001', 'completed', 'orchestrator');

    expect(coordinator.listMessages().map((m) => m.type)).toEqual([
      'task_assignment',
      'task_assignment',
      'status_update',
      'status_update',
    ]);
  });

  it('returns UnknownTaskError for unknown ids', () => {
    const result = coordinator.updateStatus('TASK-0404', 'completed', 'jira');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe('Task TASK-0404 not found');
  });

  it('leaves every other task untouched', () => {
    coordinator.createTask({ title: 'A', description: 'a', assignedAgents: ['jira'] });
    coordinator.createTask({
      title: 'B',
      description: 'b',
      assignedAgents: ['github'],
      dependencies: ['TASK-0001'],
    });
    const before = coordinator.getTask('TASK-0001');

    coordinator.updateStatus('TASK-0002', 'failed', 'github', { reason: 'timeout' });

    expect(coordinator.getTask('TASK-0001')).toEqual(before);
    expect(coordinator.getTask('TASK-0002')?.dependencies).toEqual(['TASK-0001']);
  });
});

// ─── Workflows ──────────────────────────────────────────────────

describe('orchestrateWorkflow', () => {
  it('creates the technical debt chain with cumulative dependencies', () => {
    const result = coordinator.orchestrateWorkflow('technical_debt_analysis');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.tasks.map((t) => [t.id, t.assignedAgents, t.dependencies])).toEqual([
      ['TASK-0001', ['product_manager'], []],
      ['TASK-0002', ['github'], ['TASK-0001']],
      ['TASK-0003', ['jira'], ['TASK-0001', 'TASK-0002']],
      ['TASK-0004', ['google_docs'], ['TASK-0001', 'TASK-0002', 'TASK-0003']],
    ]);
    expect(coordinator.listTasks()).toHaveLength(4);
  });

  it('creates the sprint planning graph', () => {
    const result = coordinator.orchestrateWorkflow('sprint_planning', { sprint: 'Sprint 4' });

    if (!result.ok) throw result.error;
    expect(result.value.parameters).toEqual({ sprint: 'Sprint 4' });
    expect(result.value.tasks.map((t) => t.dependencies)).toEqual([
      [],
      [],
      ['TASK-0001', 'TASK-0002'],
      ['TASK-0003'],
    ]);
  });

  it('tags assignment messages with the workflow type', () => {
    coordinator.orchestrateWorkflow('bug_investigation');

    expect(coordinator.listMessages()[0]?.metadata['workflowType']).toBe('bug_investigation');
  });

  it('rejects unknown workflow types and lists the available ones', () => {
    const result = coordinator.orchestrateWorkflow('release_party');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownWorkflowError);
    expect(result.error.message).toBe(
      'Workflow type "release_party" is not supported. Available workflows: technical_debt_analysis, sprint_planning, bug_investigation, feature_planning',
    );
    expect(coordinator.listTasks()).toEqual([]);
  });

  it('lists workflows until all of their tasks are closed', () => {
    coordinator.orchestrateWorkflow('feature_planning');
    expect(coordinator.listActiveWorkflows()).toHaveLength(1);

    for (const id of ['TASK-0001', 'TASK-0002', 'TASK-0003']) {
      coordinator.updateStatus(id, 'completed', 'orchestrator');
    }
    expect(coordinator.listActiveWorkflows()[0]?.tasks.map((t) => t.status)).toEqual([
      'completed',
      'completed',
      'completed',
      'pending',
    ]);

    coordinator.updateStatus('TASK-0004', 'cancelled', 'orchestrator');
    expect(coordinator.listActiveWorkflows()).toEqual([]);
  });
});

// ─── Workload & Metrics ─────────────────────────────────────────

describe('getWorkload', () => {
  it('scores pending tasks double and in-progress tasks triple', () => {
    coordinator.createTask({ title: 'A', description: 'a', assignedAgents: ['jira'] });
    coordinator.createTask({ title: 'B', description: 'b', assignedAgents: ['jira'] });
    coordinator.createTask({ title: 'C', description: 'c', assignedAgents: ['jira', 'github'] });
    coordinator.createTask({ title: 'D', description: 'd', assignedAgents: ['jira'] });
    coordinator.updateStatus('TASK-0002', 'in_progress', 'jira');
    coordinator.updateStatus('TASK-0004', 'completed', 'jira');

    expect(coordinator.getWorkload('jira')).toEqual({
      agent: 'jira',
      totalTasks: 4,
      pendingTasks: 2,
      inProgressTasks: 1,
      completedTasks: 1,
      recentMessages: 4,
      workloadScore: 7,
    });
  });

  it('counts only messages inside the recent window', () => {
    coordinator.send({ from: 'github', to: 'jira', type: 'request', content: 'old' });
    advance(25 * HOUR);
    coordinator.send({ from: 'github', to: 'jira', type: 'request', content: 'new' });

    expect(coordinator.getWorkload('jira').recentMessages).toBe(1);
  });

  it('has no side effects', () => {
    coordinator.createTask({ title: 'A', description: 'a', assignedAgents: ['jira'] });

    const first = coordinator.getWorkload('jira');
    const second = coordinator.getWorkload('jira');

    expect(second).toEqual(first);
    expect(coordinator.getMessages('jira')).toHaveLength(1);
  });

  it('reports every role except the orchestrator', () => {
    expect(coordinator.getAllWorkloads().map((w) => w.agent)).toEqual([
      'github',
      'jira',
      'product_manager',
      'google_docs',
    ]);
  });
});

describe('getMetrics', () => {
  it('aggregates messages, tasks and per-role activity', () => {
    coordinator.createTask({ title: 'A', description: 'a', assignedAgents: ['github', 'jira'] });
    coordinator.updateStatus('TASK-0001', 'in_progress', 'github');
    coordinator.send({ from: 'jira', to: 'product_manager', type: 'notification', content: 'fyi' });

    expect(coordinator.getMetrics()).toEqual({
      totalMessages: 4,
      totalTasks: 1,
      messagesByType: { task_assignment: 2, status_update: 1, notification: 1 },
      tasksByStatus: { in_progress: 1 },
      agentActivity: {
        github: { sent: 1, received: 1, total: 2 },
        jira: { sent: 1, received: 2, total: 3 },
        product_manager: { sent: 0, received: 1, total: 1 },
        google_docs: { sent: 0, received: 0, total: 0 },
      },
    });
  });
});

describe('simulateCommunication', () => {
  it('records a request and a correlated canned response', () => {
    const exchange = coordinator.simulateCommunication(
      'product_manager',
      'jira',
      'List the critical issues',
    );

    expect(exchange.request).toMatchObject({
      id: 'MSG-0001',
      from: 'product_manager',
      to: 'jira',
      type: 'request',
      requiresResponse: true,
    });
    expect(exchange.response).toMatchObject({
      id: 'MSG-0002',
      from: 'jira',
      to: 'product_manager',
      type: 'response',
      parentId: 'MSG-0001',
      content:
        'Found 3 critical bugs: BUG-001 (Board State Corruption), BUG-002 (Memory Leak), BUG-003 (CRM Data Sync)',
    });
  });
});
