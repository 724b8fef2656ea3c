/**
 * Canned replies used by the communication simulation, chosen by the target
 * role and keywords in the request.
 */
import type { CoordinationRole } from '@/agents/types.js';

interface CannedReply {
  /** Alternatives; a group matches when all of its keywords occur in the request. */
  keywords: string[][];
  reply: (request: string, nextTaskId: string) => string;
}

const REPLIES: Partial<Record<CoordinationRole, { rules: CannedReply[]; fallback: string }>> = {
  jira: {
    rules: [
      {
        keywords: [['critical'], ['bug']],
        reply: () =>
          'Found 3 critical bugs: BUG-001 (Board State Corruption), BUG-002 (Memory Leak), BUG-003 (CRM Data Sync)',
      },
      {
        keywords: [['sprint']],
        reply: () => 'Sprint 3 Status: Behind schedule, 65% velocity, 10 critical bugs pending',
      },
      {
        keywords: [['create', 'task']],
        reply: (request, nextTaskId) => `Task created successfully: ${nextTaskId} - ${request}`,
      },
    ],
    fallback: 'JIRA query processed successfully',
  },
  github: {
    rules: [
      {
        keywords: [['code'], ['technical debt']],
        reply: () =>
          'Found 3 high-priority technical debt items: UI Library Modernization, Performance Issues, Database Integration',
      },
      {
        keywords: [['test']],
        reply: () => 'Test coverage: 72% (target: 85%), 23 ESLint issues, 8 TypeScript errors',
      },
    ],
    fallback: 'GitHub analysis completed successfully',
  },
  google_docs: {
    rules: [
      {
        keywords: [['search']],
        reply: () =>
          'Found 5 relevant documents: PRD, Technical Architecture, Sprint Planning, Meeting Notes, User Research',
      },
      {
        keywords: [['create']],
        reply: (request) => `Document created successfully: ${request}`,
      },
    ],
    fallback: 'Google Docs operation completed successfully',
  },
  product_manager: {
    rules: [
      {
        keywords: [['risk']],
        reply: () => 'Risk Assessment: HIGH - 2 critical impact items, immediate sprint planning required',
      },
      {
        keywords: [['prioritize']],
        reply: () => 'Prioritization complete: 3 high-priority items recommended for next sprint',
      },
    ],
    fallback: 'Product management analysis completed successfully',
  },
};

/**
 * The reply `to` gives `from` for `request`. Each rule matches when any of its
 * keyword groups is fully contained in the request.
 */
export function simulatedResponse(
  from: CoordinationRole,
  to: CoordinationRole,
  request: string,
  nextTaskId: string,
): string {
  const table = REPLIES[to];
  if (!table) return `Processed request from ${from} successfully`;

  const text = request.toLowerCase();
  const rule = table.rules.find((candidate) =>
    candidate.keywords.some((group) => group.every((keyword) => text.includes(keyword))),
  );
  return rule ? rule.reply(request, nextTaskId) : table.fallback;
}
