#!/usr/bin/env node
/**
 * Inter-agent coordinator MCP server over stdio.
 *
 * Usage:
 *   npx tsx src/mcp/servers/coordinator/index.ts
 *
 * In config/huddle.json:
 *   { "id": "inter-agent-coordinator", "command": "npx",
 *     "args": ["tsx", "src/mcp/servers/coordinator/index.ts"] }
 *
 * Coordinator state lives in this process and is lost when it exits.
 * Logs go to stderr; stdout carries the protocol.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createCoordinator } from '@/coordination/coordinator.js';
import { createLogger } from '@/observability/logger.js';
import { createCoordinatorServer } from './server.js';

const logger = createLogger({ name: 'coordinator-server', stderr: true });
const server = createCoordinatorServer(createCoordinator({ logger }), { logger });

// ─── Start ───────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('Coordinator server listening on stdio', { component: 'coordinator-server' });
