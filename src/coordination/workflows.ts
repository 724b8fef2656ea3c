/**
 * Fixed multi-agent workflow definitions. Each step depends on earlier steps
 * by index, so dependency order is also creation order.
 */
import type { CoordinationRole } from '@/agents/types.js';
import { WORKFLOW_TYPES, type WorkflowType } from './types.js';

export interface WorkflowStep {
  title: string;
  description: string;
  agent: CoordinationRole;
  /** Indices of earlier steps in the same workflow. */
  dependsOn: number[];
}

export interface WorkflowDefinition {
  type: WorkflowType;
  title: string;
  steps: WorkflowStep[];
}

export const WORKFLOWS: Readonly<Record<WorkflowType, WorkflowDefinition>> = {
  technical_debt_analysis: {
    type: 'technical_debt_analysis',
    title: 'Technical Debt Analysis',
    steps: [
      {
        title: 'Analyze Technical Debt',
        description: 'Product Manager analyzes technical debt priorities',
        agent: 'product_manager',
        dependsOn: [],
      },
      {
        title: 'Get GitHub Code Analysis',
        description: 'GitHub agent provides code structure and issues analysis',
        agent: 'github',
        dependsOn: [0],
      },
      {
        title: 'Create JIRA Tasks for Debt Items',
        description: 'JIRA agent creates tasks for prioritized technical debt',
        agent: 'jira',
        dependsOn: [0, 1],
      },
      {
        title: 'Document Analysis Results',
        description: 'Google Docs agent creates technical debt analysis document',
        agent: 'google_docs',
        dependsOn: [0, 1, 2],
      },
    ],
  },
  sprint_planning: {
    type: 'sprint_planning',
    title: 'Sprint Planning',
    steps: [
      {
        title: 'Get Sprint Status from JIRA',
        description: 'JIRA agent provides current sprint status and metrics',
        agent: 'jira',
        dependsOn: [],
      },
      {
        title: 'Analyze Technical Constraints',
        description: 'GitHub agent analyzes technical constraints and testing requirements',
        agent: 'github',
        dependsOn: [],
      },
      {
        title: 'Create Sprint Recommendations',
        description: 'Product Manager creates sprint planning recommendations',
        agent: 'product_manager',
        dependsOn: [0, 1],
      },
      {
        title: 'Document Sprint Plan',
        description: 'Google Docs agent creates sprint planning document',
        agent: 'google_docs',
        dependsOn: [2],
      },
    ],
  },
  bug_investigation: {
    type: 'bug_investigation',
    title: 'Bug Investigation',
    steps: [
      {
        title: 'Collect Bug Reports',
        description: 'JIRA agent gathers the bug reports and their reproduction steps',
        agent: 'jira',
        dependsOn: [],
      },
      {
        title: 'Trace Affected Code',
        description: 'GitHub agent locates recent changes in the affected code paths',
        agent: 'github',
        dependsOn: [0],
      },
      {
        title: 'Assess Impact and Priority',
        description: 'Product Manager rates user impact and sets the fix priority',
        agent: 'product_manager',
        dependsOn: [0, 1],
      },
      {
        title: 'Write Investigation Summary',
        description: 'Google Docs agent records findings and the agreed fix plan',
        agent: 'google_docs',
        dependsOn: [2],
      },
    ],
  },
  feature_planning: {
    type: 'feature_planning',
    title: 'Feature Planning',
    steps: [
      {
        title: 'Define Feature Requirements',
        description: 'Product Manager drafts the requirements and success metrics',
        agent: 'product_manager',
        dependsOn: [],
      },
      {
        title: 'Estimate Technical Effort',
        description: 'GitHub agent reviews the codebase and estimates implementation effort',
        agent: 'github',
        dependsOn: [0],
      },
      {
        title: 'Create Feature Backlog',
        description: 'JIRA agent creates epics and stories for the feature',
        agent: 'jira',
        dependsOn: [0, 1],
      },
      {
        title: 'Publish Feature Spec',
        description: 'Google Docs agent publishes the feature specification',
        agent: 'google_docs',
        dependsOn: [0, 2],
      },
    ],
  },
};

export function isWorkflowType(value: string): value is WorkflowType {
  return WORKFLOW_TYPES.some((type) => type === value);
}
