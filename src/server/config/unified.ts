/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for all application configuration.
 * It parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server-side code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 *
 * Usage:
 *   import { config } from './config';
 */

import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import {
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  RawEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  isDevelopment,
  isProduction,
  isTest,
} from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so that a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().min(1).optional(),
    /** Jest runs keep the console quiet */
    silent: z.boolean(),
  }),
  puzzles: z.object({
    /** Absolute path of the puzzle store directory */
    dir: z.string().min(1),
    defaultSize: z.number().int().min(1),
  }),
  generator: z.object({
    maxAttempts: z.number().int().min(0),
    maxRepairs: z.number().int().min(0).optional(),
    seed: z.number().int().min(0).optional(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the typed configuration from validated environment variables.
 * Relative paths are resolved against `cwd`.
 */
export function buildConfig(env: RawEnv, cwd: string = process.cwd()): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const logFile = env.LOG_FILE?.trim() || undefined;

  const prepared = {
    nodeEnv,
    isProduction: isProduction(nodeEnv),
    isDevelopment: isDevelopment(nodeEnv),
    isTest: isTest(nodeEnv),
    app: {
      // Application version – driven by npm's injected env var when available.
      version: env.npm_package_version?.trim() || '0.1.0',
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      ...(logFile ? { file: path.resolve(cwd, logFile) } : {}),
      silent: isTest(nodeEnv) || isJestRuntime(),
    },
    puzzles: {
      dir: path.resolve(cwd, env.QUEENS_PUZZLE_DIR),
      defaultSize: env.QUEENS_DEFAULT_SIZE,
    },
    generator: {
      maxAttempts: env.QUEENS_GENERATOR_MAX_ATTEMPTS,
      ...(env.QUEENS_GENERATOR_MAX_REPAIRS !== undefined
        ? { maxRepairs: env.QUEENS_GENERATOR_MAX_REPAIRS }
        : {}),
      ...(env.QUEENS_GENERATOR_SEED !== undefined ? { seed: env.QUEENS_GENERATOR_SEED } : {}),
    },
  };

  return ConfigSchema.parse(prepared);
}

const env = loadEnvOrExit(process.env);

export const config: Readonly<AppConfig> = Object.freeze(buildConfig(env));
