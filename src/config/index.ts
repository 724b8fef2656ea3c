// ─── Schemas ────────────────────────────────────────────────────
export {
  agentDescriptorSchema,
  agentIdSchema,
  coordinationRoleSchema,
  environmentSchema,
  huddleConfigFileSchema,
  orchestrationConfigSchema,
  routingCategorySchema,
  routingConfigSchema,
} from './schema.js';
export type {
  Environment,
  HuddleConfig,
  OrchestrationConfig,
  RoutingCategory,
  RoutingConfig,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { emptyConfig, loadEnvironment, loadHuddleConfig, resolveEnvVars } from './loader.js';
