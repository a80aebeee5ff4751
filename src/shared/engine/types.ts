import { GameResult, Player, Position } from '../types/game';

// ═══════════════════════════════════════════════════════════════════════════
// FAILURE KINDS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Reasons a game log is rejected.
 *
 * Listed in the order they are detected while processing a log: input
 * problems first, then configuration, then per-move legality, and finally
 * the end-of-log check. The first applicable failure is the only one
 * reported.
 */
export enum GameFailureKind {
  INPUT_UNREADABLE = 'INPUT_UNREADABLE',
  PARSING_PROBLEM = 'PARSING_PROBLEM',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  INVALID_COLUMN = 'INVALID_COLUMN',
  COLUMN_OVERFLOW = 'COLUMN_OVERFLOW',
  TOO_MANY_MOVES = 'TOO_MANY_MOVES',
  MISSING_RESULT = 'MISSING_RESULT',
}

/**
 * A terminal failure. `moveIndex` is the 0-based position of the offending
 * move in the log for failures raised during replay.
 */
export interface GameFailure {
  ok: false;
  kind: GameFailureKind;
  reason: string;
  moveIndex?: number;
  context?: Record<string, unknown>;
}

// ═══════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Successful replay of a complete, legal game.
 */
export interface GameConclusion {
  ok: true;
  result: GameResult;
  /** Number of moves replayed. */
  moveCount: number;
  /** Cells of the first winning run found; absent for a draw. */
  winningLine?: Position[];
}

export type ReplayOutcome = GameConclusion | GameFailure;

/**
 * Outcome of an intermediate step (parsing, configuration checks, a single
 * disc drop). Carries the step's product on success.
 */
export type StepOutcome<T> = { ok: true; data: T } | GameFailure;

export function isFailure<T extends { ok: boolean }>(
  outcome: T
): outcome is Extract<T, { ok: false }> {
  return outcome.ok === false;
}

export function succeed<T>(data: T): StepOutcome<T> {
  return { ok: true, data };
}

/**
 * Helper to create a failure value.
 */
export function fail(
  kind: GameFailureKind,
  reason: string,
  extra: { moveIndex?: number; context?: Record<string, unknown> } = {}
): GameFailure {
  return { ok: false, kind, reason, ...extra };
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE STATUS
// ═══════════════════════════════════════════════════════════════════════════

export type EngineStatus =
  | { phase: 'initialized' }
  | { phase: 'in_progress'; movesApplied: number }
  | { phase: 'concluded'; outcome: GameConclusion }
  | { phase: 'failed'; failure: GameFailure };

/**
 * Notification emitted after each disc is placed during replay.
 */
export interface MoveAppliedEvent {
  moveIndex: number;
  player: Player;
  /** 1-based column as recorded in the log. */
  column: number;
  /** Row the disc landed in (0 is the bottom). */
  row: number;
}

export interface ReplayOptions {
  onMove?: (event: MoveAppliedEvent) => void;
}
