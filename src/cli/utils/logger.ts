import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config, isTest } from '../config';
import { INTERNAL_ERROR_EXIT_CODE } from '../exitCodes';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'connectz';

// Standard output carries nothing but the usage message, so every level the
// console transport emits goes to standard error.
const STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (used for LOG_FORMAT=json and the file
 * transport).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

/**
 * Create the Winston logger instance.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: STDERR_LEVELS,
      silent: isTest(config.nodeEnv),
    }),
  ],
});

const configuredLogFile = config.logging.file?.trim();
if (configuredLogFile) {
  const logFilePath = path.resolve(configuredLogFile);
  const logDir = path.dirname(logFilePath);
  try {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    logger.add(
      new winston.transports.File({
        filename: logFilePath,
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  } catch (err) {
    console.error(
      `Cannot open log file ${logFilePath}: ${err instanceof Error ? err.message : String(err)}`
    );
    process.exit(INTERNAL_ERROR_EXIT_CODE);
  }
}

export { logger };
