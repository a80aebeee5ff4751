/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all CLI code should use.
 *
 * Usage:
 *   import { config } from './config';
 */

import dotenv from 'dotenv';
import { INTERNAL_ERROR_EXIT_CODE } from '../exitCodes';
import { parseEnv, getEffectiveNodeEnv, LogLevel, LogFormat, NodeEnv } from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env cannot change test behaviour.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  // Exit codes 0-9 all describe a game log; a bad environment is neither.
  process.exit(INTERNAL_ERROR_EXIT_CODE);
}
const env =
  envResult.data ??
  (() => {
    throw new Error('Missing env data after successful parse');
  })();

export interface AppConfig {
  nodeEnv: NodeEnv;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file?: string;
  };
  diagnostics: {
    traceMoves: boolean;
  };
}

export const config: Readonly<AppConfig> = Object.freeze({
  nodeEnv: getEffectiveNodeEnv(env),
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE,
  },
  diagnostics: {
    traceMoves: env.CONNECTZ_TRACE_MOVES,
  },
});
