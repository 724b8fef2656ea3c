/**
 * Configuration loader — reads the JSON config file, resolves environment
 * variable placeholders and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { ConfigurationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { environmentSchema, huddleConfigFileSchema } from './schema.js';
import type { Environment, HuddleConfig } from './schema.js';

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the exact form `${VAR_NAME}` with the
 * value of that environment variable.
 *
 * @throws ConfigurationError if a referenced variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName === undefined) return obj;

    const value = env[varName];
    if (value === undefined) {
      throw new ConfigurationError(`Environment variable "${varName}" is not defined`, {
        variableName: varName,
      });
    }
    return value;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── Config File ────────────────────────────────────────────────

/** Configuration with no agents, default routing and default loop settings. */
export function emptyConfig(): HuddleConfig {
  return huddleConfigFileSchema.parse({});
}

/**
 * Loads and validates the orchestrator configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves `${VAR}` placeholders
 * 4. Validates against the Zod schema
 */
export async function loadHuddleConfig(
  filePath: string,
): Promise<Result<HuddleConfig, ConfigurationError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigurationError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigurationError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigurationError('Invalid JSON in configuration file', { filePath }));
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return err(error);
    }
    return err(
      new ConfigurationError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const validation = huddleConfigFileSchema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(
      new ConfigurationError('Configuration validation failed', {
        filePath,
        issues,
      }),
    );
  }

  return ok(validation.data);
}

// ─── Environment ────────────────────────────────────────────────

/** Validate the process environment. */
export function loadEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): Result<Environment, ConfigurationError> {
  const validation = environmentSchema.safeParse(env);
  if (!validation.success) {
    return err(
      new ConfigurationError('Environment validation failed', {
        issues: validation.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return ok(validation.data);
}
