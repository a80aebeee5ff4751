/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from './config';
 *
 * Architecture:
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly and validation logic
 * - `index.ts` (this file) - Canonical re-export point
 */

export { config } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  getEffectiveNodeEnv,
  isTest,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
