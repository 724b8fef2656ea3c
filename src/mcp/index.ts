/**
 * Agent connections over MCP.
 * Spawns configured agent processes, tracks their lifecycle and exposes each
 * ready agent as an AgentToolProvider.
 */
export type {
  AgentConnectionState,
  AgentConnectionStatus,
  ConnectSummary,
  MCPConnection,
  MCPTransportStatus,
} from './types.js';
export { ALLOWED_TRANSITIONS } from './types.js';
export { AgentConnectionError, AgentTimeoutError, ConnectionStateError } from './errors.js';
export { createMCPConnection, DEFAULT_CONNECT_TIMEOUT_MS, withTimeout } from './mcp-client.js';
export type { CreateMCPConnectionOptions } from './mcp-client.js';
export { createAgentConnector, resolveLaunchTarget } from './agent-connector.js';
export type { AgentConnector, AgentConnectorOptions } from './agent-connector.js';
