/**
 * Markdown renderings of coordinator state, returned as tool output.
 */
import type {
  AgentMessage,
  CoordinationMetrics,
  CoordinationTask,
  SimulatedExchange,
  WorkflowRun,
  WorkloadSnapshot,
} from './types.js';
import { WORKFLOWS } from './workflows.js';

/** Messages listed per request. Older ones are still counted. */
export const MESSAGE_LIST_LIMIT = 10;

const CONTENT_PREVIEW_LENGTH = 100;

/** `product_manager` → `Product Manager` */
export function titleCase(value: string): string {
  return value
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function preview(content: string): string {
  return content.length > CONTENT_PREVIEW_LENGTH
    ? `${content.slice(0, CONTENT_PREVIEW_LENGTH)}...`
    : content;
}

export function formatSentMessage(message: AgentMessage): string {
  return [
    '**Message Sent**',
    '',
    `• **ID:** ${message.id}`,
    `• **From:** ${titleCase(message.from)}`,
    `• **To:** ${titleCase(message.to)}`,
    `• **Type:** ${titleCase(message.type)}`,
    `• **Content:** ${message.content}`,
    `• **Timestamp:** ${message.timestamp.toISOString()}`,
    `• **Requires Response:** ${message.requiresResponse ? 'Yes' : 'No'}`,
  ].join('\n');
}

export function formatCreatedTask(task: CoordinationTask): string {
  const lines = [
    '**Coordination Task Created**',
    '',
    `• **ID:** ${task.id}`,
    `• **Title:** ${task.title}`,
    `• **Description:** ${task.description}`,
    `• **Assigned Agents:** ${task.assignedAgents.map(titleCase).join(', ')}`,
    `• **Status:** ${titleCase(task.status)}`,
    `• **Created:** ${task.createdAt.toISOString()}`,
  ];
  if (task.dependencies.length > 0) {
    lines.push(`• **Dependencies:** ${task.dependencies.join(', ')}`);
  }
  lines.push('', 'Task assignment messages sent to all assigned agents.');
  return lines.join('\n');
}

export function formatStatusUpdate(task: CoordinationTask, updatedBy: string): string {
  const lines = [
    '**Task Status Updated**',
    '',
    `• **Task ID:** ${task.id}`,
    `• **New Status:** ${titleCase(task.status)}`,
    `• **Updated By:** ${titleCase(updatedBy)}`,
    `• **Updated At:** ${task.updatedAt.toISOString()}`,
  ];
  if (Object.keys(task.results).length > 0) {
    lines.push(`• **Results:** ${JSON.stringify(task.results, null, 2)}`);
  }
  lines.push('', 'Status update notifications sent to other assigned agents.');
  return lines.join('\n');
}

export function formatMessageList(
  agent: string,
  messages: readonly AgentMessage[],
  unreadOnly: boolean,
): string {
  if (messages.length === 0) {
    return `**No ${unreadOnly ? 'unread ' : ''}messages for ${titleCase(agent)}**`;
  }

  const lines = [
    `**Messages for ${titleCase(agent)} (${messages.length} ${unreadOnly ? 'unread' : 'total'}):**`,
    '',
  ];
  for (const message of messages.slice(-MESSAGE_LIST_LIMIT)) {
    lines.push(`**${message.id}** - ${titleCase(message.type)}`);
    lines.push(`• From: ${titleCase(message.from)}`);
    lines.push(`• Content: ${preview(message.content)}`);
    lines.push(`• Time: ${message.timestamp.toISOString()}`);
    if (message.requiresResponse) lines.push('• **Requires Response**');
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

export function formatExchange(exchange: SimulatedExchange): string {
  const { request, response } = exchange;
  return [
    '**Agent Communication Simulation**',
    '',
    '**Request:**',
    `• From: ${titleCase(request.from)}`,
    `• To: ${titleCase(request.to)}`,
    `• Message: ${request.content}`,
    '',
    '**Response:**',
    `• From: ${titleCase(response.from)}`,
    `• Message: ${response.content}`,
    '',
    'Messages logged in the coordination system.',
  ].join('\n');
}

export function formatWorkloads(workloads: readonly WorkloadSnapshot[]): string {
  const lines = ['**Agent Workload Status:**', ''];
  for (const workload of workloads) {
    lines.push(
      `**${titleCase(workload.agent)}:**`,
      `• Total Tasks: ${workload.totalTasks}`,
      `• Pending: ${workload.pendingTasks}`,
      `• In Progress: ${workload.inProgressTasks}`,
      `• Completed: ${workload.completedTasks}`,
      `• Recent Messages: ${workload.recentMessages}`,
      `• Workload Score: ${workload.workloadScore}`,
      '',
    );
  }
  return lines.join('\n').trimEnd();
}

export function formatWorkflowRun(run: WorkflowRun): string {
  const lines = [`**${WORKFLOWS[run.workflowType].title} Workflow Orchestrated**`, '', '**Created Tasks:**'];
  run.tasks.forEach((task, index) => {
    const after = task.dependencies.length > 0 ? ` (after ${task.dependencies.join(', ')})` : '';
    lines.push(`${index + 1}. ${task.id}: ${task.title} [${task.assignedAgents.map(titleCase).join(', ')}]${after}`);
  });
  lines.push('', 'Workflow will execute in dependency order.');
  return lines.join('\n');
}

export function formatMetrics(metrics: CoordinationMetrics): string {
  const lines = [
    '**Coordination Metrics:**',
    '',
    '**Overall Statistics:**',
    `• Total Messages: ${metrics.totalMessages}`,
    `• Total Tasks: ${metrics.totalTasks}`,
    '',
    '**Message Types:**',
  ];
  for (const [type, count] of Object.entries(metrics.messagesByType)) {
    lines.push(`• ${titleCase(type)}: ${count ?? 0}`);
  }
  lines.push('', '**Task Status Distribution:**');
  for (const [status, count] of Object.entries(metrics.tasksByStatus)) {
    lines.push(`• ${titleCase(status)}: ${count ?? 0}`);
  }
  lines.push('', '**Agent Activity:**');
  for (const [agent, activity] of Object.entries(metrics.agentActivity)) {
    if (!activity) continue;
    lines.push(
      `• ${titleCase(agent)}: ${activity.total} messages (${activity.sent} sent, ${activity.received} received)`,
    );
  }
  return lines.join('\n');
}
