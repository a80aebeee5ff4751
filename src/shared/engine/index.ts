// =============================================================================
// CONNECT-Z VALIDATION ENGINE - PUBLIC API
// =============================================================================
// Hosts (the CLI, tests) should only import from this file.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - PURE: No I/O; failures are returned as values, never thrown
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export { Player, GameResult, positionToString, resultForPlayer } from '../types/game';
export type { GameConfig, Position, Cell, BoardState, GameRecord } from '../types/game';

// =============================================================================
// OUTCOMES
// =============================================================================

export { GameFailureKind, isFailure, succeed, fail } from './types';
export type {
  GameFailure,
  GameConclusion,
  ReplayOutcome,
  StepOutcome,
  EngineStatus,
  MoveAppliedEvent,
  ReplayOptions,
} from './types';

// =============================================================================
// PARSING & CONFIGURATION
// =============================================================================

export {
  parseGameRecord,
  parseGameRecordText,
  parseConfigLine,
  parseInteger,
  splitRecords,
} from './gameRecordParser';
export { validateGameConfig } from './rulesConfig';

// =============================================================================
// BOARD
// =============================================================================

export {
  createEmptyBoard,
  dropDisc,
  getCell,
  getOpponent,
  isBoardFull,
  playerAt,
} from './boardState';

// =============================================================================
// LINE DETECTION
// =============================================================================

export { enumerateLines, findRunInLine, findWinningLine, hasWinningLine } from './lineDetection';

// =============================================================================
// REPLAY
// =============================================================================

export { ConnectZEngine, validateGameLog } from './ConnectZEngine';
