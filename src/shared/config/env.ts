/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for the environment variables the
 * puzzle engine reads, validates them, and exports a typed config object.
 */

import { z } from 'zod';
import type { CellStoragePreference } from '../types/puzzle';
import { InvalidArgumentError } from '../engine/errors';
import { isJestRuntime } from '../utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/** winston's npm levels. */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Cell storage used when a constructor is not given an explicit choice.
 */
export const StoragePreferenceSchema = z.enum(['auto', 'array', 'packed']);

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Default cell storage for new states */
  PUZZLE_STORAGE: StoragePreferenceSchema.default('auto'),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvIssue {
  path: string;
  message: string;
}

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: EnvIssue[];
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Under Jest the environment is always treated as 'test'.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export interface PuzzleConfig {
  nodeEnv: NodeEnv;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  storage: CellStoragePreference;
}

export function buildConfig(rawEnv: RawEnv): PuzzleConfig {
  return {
    nodeEnv: getEffectiveNodeEnv(rawEnv),
    logging: {
      level: rawEnv.LOG_LEVEL,
      format: rawEnv.LOG_FORMAT,
    },
    storage: rawEnv.PUZZLE_STORAGE,
  };
}

let cachedConfig: PuzzleConfig | undefined;

/**
 * Load and validate configuration once, throwing on invalid input.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): PuzzleConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = parseEnv(env);
  if (!result.success || !result.data) {
    const details = (result.errors ?? [])
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new InvalidArgumentError(
      `Invalid environment configuration: ${details}`,
      { errors: result.errors ?? [] },
      'Config'
    );
  }

  cachedConfig = buildConfig(result.data);
  return cachedConfig;
}

export interface ResolvedConfig {
  config: PuzzleConfig;
  /** Issues that forced a fallback to the defaults; empty when the environment was valid. */
  errors: EnvIssue[];
}

/**
 * Non-throwing variant of loadConfig() for code that runs at import time or
 * inside engine operations. An invalid environment yields the schema
 * defaults together with the issues found.
 */
export function resolveConfig(
  env: Record<string, string | undefined> = process.env
): ResolvedConfig {
  if (cachedConfig) {
    return { config: cachedConfig, errors: [] };
  }

  const result = parseEnv(env);
  if (result.success && result.data) {
    cachedConfig = buildConfig(result.data);
    return { config: cachedConfig, errors: [] };
  }

  cachedConfig = buildConfig(EnvSchema.parse({}));
  return { config: cachedConfig, errors: result.errors ?? [] };
}

/** Drop the cached config so the next loadConfig() re-reads the environment. */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
