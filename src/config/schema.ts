/**
 * Zod schemas for the orchestrator configuration file and the process environment.
 * String keys from configuration are validated into closed unions and branded ids here,
 * so the rest of the system never sees an unchecked agent id or role.
 */
import { z } from 'zod';
import { COORDINATION_ROLES } from '@/agents/types.js';
import { toAgentId } from '@/core/types.js';

// ─── Agent Id ───────────────────────────────────────────────────

/**
 * Agent ids become the prefix of qualified tool names (`<agentId>_<tool>`),
 * so they may not contain the underscore separator.
 */
export const agentIdSchema = z
  .string()
  .min(1, 'Agent id cannot be empty')
  .regex(/^[A-Za-z0-9-]+$/, 'Agent id may only contain letters, digits and "-"')
  .transform(toAgentId);

export const coordinationRoleSchema = z.enum(COORDINATION_ROLES);

// ─── Agent Descriptor ───────────────────────────────────────────

/**
 * Schema for a single agent process.
 */
export const agentDescriptorSchema = z.object({
  id: agentIdSchema,
  transport: z.literal('stdio').default('stdio'),
  command: z.string().min(1, 'Agent command cannot be empty'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).default({}),
  capabilities: z.array(z.string().min(1)).default([]),
  role: coordinationRoleSchema.optional(),
});

// ─── Routing ────────────────────────────────────────────────────

/**
 * Schema for one routing category: the keywords that make an agent relevant.
 */
export const routingCategorySchema = z.object({
  name: z.string().min(1, 'Category name cannot be empty'),
  agentId: agentIdSchema,
  keywords: z.array(z.string().min(1, 'Keyword cannot be empty')).min(1, 'Category needs at least one keyword'),
});

export const routingConfigSchema = z
  .object({
    categories: z.array(routingCategorySchema).default([]),
    defaultAgents: z.array(agentIdSchema).min(1).default(['github-agent', 'jira-agent']),
    coordinatorAgentId: agentIdSchema.default('inter-agent-coordinator'),
  })
  .refine(
    (data) => new Set(data.categories.map((c) => c.agentId)).size === data.categories.length,
    { message: 'Each agent may be targeted by only one routing category', path: ['categories'] },
  );

// ─── Orchestration ──────────────────────────────────────────────

export const orchestrationConfigSchema = z.object({
  model: z.string().min(1, 'Model identifier cannot be empty').default('claude-sonnet-4-5-20250929'),
  maxIterations: z.number().int().positive().max(50).default(10),
  maxOutputTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(1).default(1),
  connectTimeoutMs: z.number().int().positive().default(30_000),
  threadContextLimit: z.number().int().min(0).default(5),
});

// ─── Config File ────────────────────────────────────────────────

/**
 * Schema for the whole configuration file.
 * Every section has defaults, so `{}` parses into an empty agent set.
 */
export const huddleConfigFileSchema = z
  .object({
    agents: z.array(agentDescriptorSchema).default([]),
    routing: routingConfigSchema.default({}),
    orchestration: orchestrationConfigSchema.default({}),
  })
  .refine(
    (data) => new Set(data.agents.map((a) => a.id)).size === data.agents.length,
    { message: 'Agent ids must be unique', path: ['agents'] },
  );

// ─── Environment ────────────────────────────────────────────────

export const environmentSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1, 'ANTHROPIC_API_KEY is required'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  HUDDLE_CONFIG_PATH: z.string().min(1).default('config/huddle.json'),
  SLACK_BOT_TOKEN: z.string().min(1).optional(),
  SLACK_SIGNING_SECRET: z.string().min(1).optional(),
});

// ─── Inferred Types ─────────────────────────────────────────────

/** Inferred type from routingCategorySchema */
export type RoutingCategory = z.infer<typeof routingCategorySchema>;

/** Inferred type from routingConfigSchema */
export type RoutingConfig = z.infer<typeof routingConfigSchema>;

/** Inferred type from orchestrationConfigSchema */
export type OrchestrationConfig = z.infer<typeof orchestrationConfigSchema>;

/** Inferred type from huddleConfigFileSchema */
export type HuddleConfig = z.infer<typeof huddleConfigFileSchema>;

/** Inferred type from environmentSchema */
export type Environment = z.infer<typeof environmentSchema>;
