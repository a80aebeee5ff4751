/**
 * Test Fixtures and Utilities
 * Common test data and helper functions for Connect-Z tests
 */

import { BoardState, GameConfig, Player, Position } from '../../src/shared/types/game';
import { createEmptyBoard } from '../../src/shared/engine/boardState';

/**
 * Position helper - creates a position object
 */
export function pos(x: number, y: number): Position {
  return { x, y };
}

export function cfg(columns: number, rows: number, winLength: number): GameConfig {
  return { columns, rows, winLength };
}

/**
 * Creates a board from a compact column description. Each string lists one
 * column bottom-up: '1' for a FIRST disc, '2' for a SECOND disc.
 *
 * @example
 *   createTestBoard(cfg(3, 2, 2), ['12', '1', ''])
 */
export function createTestBoard(config: GameConfig, columns: string[] = []): BoardState {
  const board = createEmptyBoard(config);
  columns.forEach((column, x) => {
    for (const ch of column) {
      board.columns[x].push(ch === '1' ? Player.FIRST : Player.SECOND);
    }
  });
  return board;
}

/**
 * Builds game log records from a header and a list of 1-based columns.
 */
export function gameLog(config: GameConfig, moves: number[]): string[] {
  return [`${config.columns} ${config.rows} ${config.winLength}`, ...moves.map(String)];
}
