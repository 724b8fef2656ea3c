/**
 * Qualified tool names: `<agentId>_<toolName>`.
 *
 * Agent ids never contain the separator, so splitting on the first occurrence
 * recovers the pair exactly, even when the tool name itself contains `_`.
 */
import type { AgentId } from '@/core/types.js';
import { toAgentId } from '@/core/types.js';

export const TOOL_NAME_SEPARATOR = '_';

/** Longest tool name the model API accepts. */
export const MAX_QUALIFIED_NAME_LENGTH = 64;

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface DecodedToolName {
  agentId: AgentId;
  toolName: string;
}

export function encodeToolName(agentId: AgentId, toolName: string): string {
  return `${agentId}${TOOL_NAME_SEPARATOR}${toolName}`;
}

/** Split a qualified name on its first separator. Returns undefined when there is none. */
export function decodeToolName(qualifiedName: string): DecodedToolName | undefined {
  const index = qualifiedName.indexOf(TOOL_NAME_SEPARATOR);
  if (index <= 0) return undefined;
  return {
    agentId: toAgentId(qualifiedName.slice(0, index)),
    toolName: qualifiedName.slice(index + TOOL_NAME_SEPARATOR.length),
  };
}

/**
 * Why a tool cannot be exposed under a qualified name, or undefined when it can.
 */
export function checkToolName(agentId: AgentId, toolName: string): string | undefined {
  if (toolName.length === 0) return 'tool name is empty';
  if (toolName.startsWith(TOOL_NAME_SEPARATOR)) {
    return `tool name starts with "${TOOL_NAME_SEPARATOR}"`;
  }
  if (!TOOL_NAME_PATTERN.test(toolName)) return 'tool name contains unsupported characters';
  const length = encodeToolName(agentId, toolName).length;
  if (length > MAX_QUALIFIED_NAME_LENGTH) {
    return `qualified name is ${length} characters, limit is ${MAX_QUALIFIED_NAME_LENGTH}`;
  }
  return undefined;
}
