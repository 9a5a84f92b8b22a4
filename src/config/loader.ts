/**
 * Configuration loader — reads the JSON config file, resolves environment
 * variable placeholders, and validates the result with Zod.
 */
import { readFile } from 'node:fs/promises';

import { AuditError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { auditConfigFileSchema } from './schema.js';
import type { AuditConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error raised when configuration or command-line options are missing or invalid.
 */
export class ConfigError extends AuditError {
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
 * Recursively replaces strings of the exact form `${VAR_NAME}` with the
 * value of that environment variable. Partial patterns are left alone.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName !== undefined) {
      const value = process.env[varName];
      if (value === undefined || value === '') {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  return obj;
}

// ─── Configuration Loader ───────────────────────────────────────

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Loads and validates the auditor configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadAuditConfig(filePath: string): Promise<Result<AuditConfig, ConfigError>> {
  // 1. Read the file
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = isErrnoException(error) ? error.code : undefined;
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
    resolved = resolveEnvVars(parsed);
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
  const validation = auditConfigFileSchema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(
      new ConfigError('Configuration validation failed', {
        filePath,
        issues,
      }),
    );
  }

  return ok(validation.data);
}
