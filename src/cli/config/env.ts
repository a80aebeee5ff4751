/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for the environment variables the CLI
 * reads, validates them, and exports the inferred types.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const booleanFlag = z
  .string()
  .optional()
  .transform((val) => val === 'true' || val === '1');

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /**
   * Application log level. Defaults to `warn` so a normal run is silent
   * apart from the exit code.
   */
  LOG_LEVEL: LogLevelSchema.default('warn'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Log file path (optional); receives JSON entries */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // DIAGNOSTICS
  // ===================================================================

  /** Log every applied move at debug level */
  CONNECTZ_TRACE_MOVES: booleanFlag,
});

export type RawEnv = z.infer<typeof EnvSchema>;

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
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
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

  return { success: true, data: result.data };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
