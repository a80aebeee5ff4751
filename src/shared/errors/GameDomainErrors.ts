/**
 * Game Domain Errors - Structured error types raised at the I/O boundary
 *
 * The validation engine never throws: it reports rejected logs as
 * `GameFailure` values. These classes cover what happens around it, such as
 * reading the log from disk, and carry a code the CLI maps to an exit code.
 *
 * Usage:
 * ```typescript
 * import { GameError, InputUnreadableError } from './GameDomainErrors';
 *
 * throw new InputUnreadableError('games/final.txt', 'ENOENT');
 *
 * if (error instanceof GameError) {
 *   logger.warn(error.message, error.context);
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum GameErrorCode {
  // Input Errors
  INPUT_UNREADABLE = 'INPUT_UNREADABLE',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  /** Serialize to a JSON-safe object for structured logs */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a GameError.
 */
export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error when the game log cannot be opened or read.
 */
export class InputUnreadableError extends GameError {
  constructor(filePath: string, reason: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.INPUT_UNREADABLE, `Cannot read game log ${filePath}: ${reason}`, {
      filePath,
      reason,
      ...context,
    });
    this.name = 'InputUnreadableError';
    Object.setPrototypeOf(this, InputUnreadableError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a GameError.
 */
export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(GameErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
