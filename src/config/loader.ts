/**
 * Configuration loader — reads JSON config files, validates with Zod,
 * and resolves environment variable placeholders.
 */
import { readFile } from 'node:fs/promises';

import { RunwardenError, errorMessage } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { EngineConfigInput } from './schema.js';
import { engineConfigSchema } from './schema.js';
import type { EngineConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends RunwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Replace every string that is exactly `${NAME}` with `env.NAME`, at any depth.
 * @throws ConfigError when a referenced variable is unset
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
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

  // Numbers, booleans and null pass through
  return obj;
}

// ─── Validation ─────────────────────────────────────────────────

/**
 * Validate a raw config value and fill in defaults.
 * `resolveConfig()` with no argument yields the default configuration.
 */
export function resolveConfig(raw: unknown = {}): Result<EngineConfig, ConfigError> {
  const validation = engineConfigSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { issues }));
  }
  return ok(validation.data);
}

/** Default configuration, typed input for callers that build config in code. */
export function defaultConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return engineConfigSchema.parse(overrides);
}

// ─── Configuration Loader ───────────────────────────────────────

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error ? String(error.code) : undefined;
}

async function readConfigFile(filePath: string): Promise<Result<string, ConfigError>> {
  try {
    return ok(await readFile(filePath, 'utf-8'));
  } catch (error) {
    const errorCode = errnoCode(error);
    const message = errorCode === 'ENOENT'
      ? `Configuration file not found: ${filePath}`
      : `Failed to read configuration file: ${filePath}`;
    return err(new ConfigError(message, { filePath, errorCode, errorMessage: errorMessage(error) }));
  }
}

function parseConfigJson(content: string, filePath: string): Result<unknown, ConfigError> {
  try {
    const parsed: unknown = JSON.parse(content);
    return ok(resolveEnvVars(parsed));
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }
}

/**
 * Load a JSON config file, substitute `${VAR}` placeholders from the
 * environment, then validate and fill defaults.
 */
export async function loadEngineConfig(
  filePath: string,
): Promise<Result<EngineConfig, ConfigError>> {
  const content = await readConfigFile(filePath);
  if (!content.ok) return content;

  const raw = parseConfigJson(content.value, filePath);
  if (!raw.ok) return raw;

  const validated = resolveConfig(raw.value);
  if (validated.ok) return validated;
  return err(new ConfigError(validated.error.message, { filePath, ...validated.error.context }));
}
