import { BoardState, Cell, GameConfig, Player } from '../types/game';
import { GameFailureKind, StepOutcome, fail, succeed } from './types';

export function createEmptyBoard(config: GameConfig): BoardState {
  return {
    config,
    columns: Array.from({ length: config.columns }, (): Player[] => []),
  };
}

/**
 * Player to move at a 0-based move index. Turns strictly alternate,
 * starting with {@link Player.FIRST}.
 */
export function playerAt(moveIndex: number): Player {
  return moveIndex % 2 === 0 ? Player.FIRST : Player.SECOND;
}

export function getOpponent(player: Player): Player {
  return player === Player.FIRST ? Player.SECOND : Player.FIRST;
}

/**
 * Read a cell. Positions above a column's current fill height, and positions
 * off the board, are empty.
 */
export function getCell(board: BoardState, x: number, y: number): Cell {
  const column = board.columns[x];
  if (column === undefined || y < 0 || y >= column.length) {
    return null;
  }
  return column[y];
}

export function isBoardFull(board: BoardState): boolean {
  return board.columns.every((column) => column.length === board.config.rows);
}

/**
 * Drop a disc for `player` into a 1-based `column`.
 *
 * Validates the column reference first, then the column's remaining
 * capacity. On success the board is mutated in place and the landing row is
 * returned.
 */
export function dropDisc(board: BoardState, player: Player, column: number): StepOutcome<number> {
  const { columns, rows } = board.config;

  if (!Number.isInteger(column) || column < 1 || column > columns) {
    return fail(GameFailureKind.INVALID_COLUMN, `Invalid column ${column}`, {
      context: { column, columns },
    });
  }

  const discs = board.columns[column - 1];
  if (discs.length >= rows) {
    return fail(GameFailureKind.COLUMN_OVERFLOW, `Column ${column} is too high`, {
      context: { column, rows },
    });
  }

  discs.push(player);
  return succeed(discs.length - 1);
}
