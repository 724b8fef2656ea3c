/**
 * MCP server exposing the coordination tools and read-only JSON views of
 * coordinator state.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { COORDINATION_ROLES } from '@/agents/types.js';
import { createCoordinatorAgent } from '@/coordination/coordinator-tools.js';
import type { Coordinator } from '@/coordination/coordinator.js';
import type { Logger } from '@/observability/logger.js';

export const SERVER_NAME = 'inter-agent-coordinator';
export const SERVER_VERSION = '1.0.0';

// ─── Resources ───────────────────────────────────────────────────────

const RESOURCES = [
  {
    uri: 'coordination://messages',
    name: 'Message Queue',
    mimeType: 'application/json',
    description: 'All inter-agent messages',
  },
  {
    uri: 'coordination://tasks',
    name: 'Coordination Tasks',
    mimeType: 'application/json',
    description: 'All coordination tasks and their status',
  },
  {
    uri: 'coordination://agent-status',
    name: 'Agent Status',
    mimeType: 'application/json',
    description: 'Current status and workload of all agents',
  },
  {
    uri: 'coordination://workflows',
    name: 'Active Workflows',
    mimeType: 'application/json',
    description: 'Workflow runs with pending or in-progress tasks',
  },
];

function readResource(coordinator: Coordinator, uri: string): unknown {
  switch (uri) {
    case 'coordination://messages':
      return coordinator.listMessages();
    case 'coordination://tasks':
      return coordinator.listTasks();
    case 'coordination://agent-status':
      return Object.fromEntries(
        COORDINATION_ROLES.map((role) => [role, coordinator.getWorkload(role)]),
      );
    case 'coordination://workflows':
      return coordinator.listActiveWorkflows();
    default:
      throw new McpError(ErrorCode.InvalidParams, `Resource not found: ${uri}`);
  }
}

// ─── Server ──────────────────────────────────────────────────────────

export interface CoordinatorServerOptions {
  logger?: Logger;
}

/** Build an unconnected server; the caller picks the transport. */
export function createCoordinatorServer(
  coordinator: Coordinator,
  options?: CoordinatorServerOptions,
): Server {
  const agent = createCoordinatorAgent(coordinator, {
    agentId: SERVER_NAME,
    logger: options?.logger,
  });

  // eslint-disable-next-line @typescript-eslint/no-deprecated
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const operations = await agent.listOperations();
    return {
      tools: operations.map((operation) => ({
        name: operation.name,
        description: operation.description,
        inputSchema: { ...operation.inputSchema, type: 'object' as const },
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await agent.invoke(request.params.name, request.params.arguments ?? {});
    return {
      content: [{ type: 'text' as const, text: result.text }],
      isError: result.isError,
    };
  });

  server.setRequestHandler(ListResourcesRequestSchema, () =>
    Promise.resolve({ resources: RESOURCES }),
  );

  server.setRequestHandler(ReadResourceRequestSchema, (request) => {
    const { uri } = request.params;
    const data = readResource(coordinator, uri);
    return Promise.resolve({
      contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(data, null, 2) }],
    });
  });

  return server;
}
