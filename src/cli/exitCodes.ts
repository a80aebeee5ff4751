import { GameFailureKind, GameResult, ReplayOutcome } from '../shared/engine';
import { GameErrorCode, isGameError } from '../shared/errors';

/** Exit code for a wrong number of command-line arguments. */
export const USAGE_EXIT_CODE = 2;

/** Exit code for unexpected internal errors; no outcome maps to it. */
export const INTERNAL_ERROR_EXIT_CODE = 70;

export const RESULT_EXIT_CODES: Record<GameResult, number> = {
  [GameResult.DRAW]: 0,
  [GameResult.FIRST_WON]: 1,
  [GameResult.SECOND_WON]: 2,
};

export const FAILURE_EXIT_CODES: Record<GameFailureKind, number> = {
  [GameFailureKind.MISSING_RESULT]: 3,
  [GameFailureKind.TOO_MANY_MOVES]: 4,
  [GameFailureKind.COLUMN_OVERFLOW]: 5,
  [GameFailureKind.INVALID_COLUMN]: 6,
  [GameFailureKind.INVALID_CONFIGURATION]: 7,
  [GameFailureKind.PARSING_PROBLEM]: 8,
  [GameFailureKind.INPUT_UNREADABLE]: 9,
};

export function exitCodeForOutcome(outcome: ReplayOutcome): number {
  return outcome.ok ? RESULT_EXIT_CODES[outcome.result] : FAILURE_EXIT_CODES[outcome.kind];
}

export function exitCodeForError(error: unknown): number {
  if (isGameError(error) && error.code === GameErrorCode.INPUT_UNREADABLE) {
    return FAILURE_EXIT_CODES[GameFailureKind.INPUT_UNREADABLE];
  }
  return INTERNAL_ERROR_EXIT_CODE;
}
