import { GameConfig } from '../types/game';
import { GameFailureKind, StepOutcome, fail, succeed } from './types';

/**
 * Check the configuration invariant: every dimension is at least 1 and the
 * run length fits along the longer side of the board
 * (`winLength <= max(columns, rows)`).
 *
 * A configuration failing this check can never produce a winner, so the log
 * is rejected before any move is looked at.
 */
export function validateGameConfig(config: GameConfig): StepOutcome<GameConfig> {
  const { columns, rows, winLength } = config;

  if (winLength > Math.max(columns, rows) || Math.min(columns, rows, winLength) < 1) {
    return fail(
      GameFailureKind.INVALID_CONFIGURATION,
      `Illegal game x=${columns} y=${rows} z=${winLength}`,
      { context: { columns, rows, winLength } }
    );
  }

  return succeed(Object.freeze({ columns, rows, winLength }));
}

