/**
 * Configuration loader — reads the JSON credentials configuration, resolves
 * environment variable placeholders and validates with Zod. Runtime settings
 * come from the environment and are validated the same way.
 */
import { readFile } from 'node:fs/promises';

import { CredentialsError, systemErrorCode } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { CredentialsConfig, Settings } from './schema.js';
import { credentialsConfigSchema, settingsSchema } from './schema.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends CredentialsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the form `${VAR_NAME}` with the value of
 * that environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(
  obj: unknown,
  env: Readonly<Record<string, string | undefined>> = process.env,
): unknown {
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

  return obj;
}

function issuesOf(error: { issues: { path: (string | number)[]; message: string }[] }) {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

// ─── Credentials Configuration ──────────────────────────────────

/**
 * Loads and validates a credentials configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadCredentialsConfig(
  filePath: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): Promise<Result<CredentialsConfig, ConfigError>> {
  // 1. Read the file
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = systemErrorCode(error);
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 2. Parse JSON
  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  // 3. Resolve environment variables
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  // 4. Validate with Zod
  const validation = credentialsConfigSchema.safeParse(resolved);
  if (!validation.success) {
    return err(
      new ConfigError('Configuration validation failed', {
        filePath,
        issues: issuesOf(validation.error),
      }),
    );
  }

  return ok(validation.data);
}

// ─── Settings ───────────────────────────────────────────────────

/** Validate runtime settings from the environment. */
export function loadSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Result<Settings, ConfigError> {
  const validation = settingsSchema.safeParse(env);
  if (!validation.success) {
    return err(new ConfigError('Invalid settings', { issues: issuesOf(validation.error) }));
  }
  return ok(validation.data);
}
