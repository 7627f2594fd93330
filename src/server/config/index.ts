/**
 * Configuration Module - Canonical Entry Point
 *
 * All server-side code should import configuration from this module:
 *
 * Usage:
 *   import { config } from './config';
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly and validation logic
 * - `index.ts` (this file) - Canonical re-export point
 */

// ============================================================================
// Primary Configuration Export
// ============================================================================

export { config, buildConfig } from './unified';
export type { AppConfig } from './unified';

// ============================================================================
// Environment Schema & Utilities
// ============================================================================

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  loadEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
  isProduction,
  isDevelopment,
  isTest,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
