/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { MAX_GENERATED_SIZE } from '../../shared/puzzle/constants';
import { ConfigurationError, getExitCode } from '../../shared/errors';

/**
 * Node environment schema - supports development, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Empty strings count as unset, so `FOO=` in a .env file falls back to the
 * default instead of failing number coercion.
 */
const optionalInt = (min: number, max: number) =>
  z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().min(min).max(max).optional()
  );

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category:
 * - Environment
 * - Logging
 * - Puzzle store and generation
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional file that receives every log entry as JSON */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // PUZZLES
  // ===================================================================

  /** Directory of the file-backed puzzle store */
  QUEENS_PUZZLE_DIR: z.string().min(1).default('./puzzles'),

  /** Grid size used when a command does not pass one */
  QUEENS_DEFAULT_SIZE: z.coerce.number().int().min(1).max(MAX_GENERATED_SIZE).default(8),

  /** Zone regrowths before the generator falls back to singleton zones */
  QUEENS_GENERATOR_MAX_ATTEMPTS: z.coerce.number().int().min(0).max(1000).default(20),

  /** Repairs per regrowth; 4·N² when unset */
  QUEENS_GENERATOR_MAX_REPAIRS: optionalInt(0, 1_000_000),

  /** Fixed generator seed for reproducible runs */
  QUEENS_GENERATOR_SEED: optionalInt(0, 0xffffffff),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validation result with data or errors
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          }))
        : [
            {
              path: '',
              message: result.error.message,
            },
          ];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validated environment object
 * @throws ConfigurationError listing every invalid variable
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    throw new ConfigurationError(result.errors ?? []);
  }

  return result.data;
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * This function should be called once at startup. If validation fails,
 * it prints one line per invalid variable and exits with the
 * configuration error status (78).
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validated environment object
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  try {
    return loadEnv(env);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) {
      throw err;
    }
    console.error(`${err.message}:`);
    for (const issue of err.issues) {
      console.error(`  - ${issue.path || 'root'}: ${issue.message}`);
    }
    return process.exit(getExitCode(err));
  }
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV to ensure test-specific behavior.
 *
 * @param rawEnv - Raw environment variables
 * @returns Effective node environment
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

/**
 * Check if running in production mode.
 */
export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

/**
 * Check if running in development mode.
 */
export function isDevelopment(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'development';
}

/**
 * Check if running in test mode.
 */
export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
