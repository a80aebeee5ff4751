import { BoardState, GameConfig, Player, Position } from '../types/game';
import { getCell } from './boardState';

/**
 * Enumerate every line on which a run of `winLength` discs could form.
 *
 * Families, in order:
 * - each column, bottom to top;
 * - each row, left to right;
 * - for every start offset `(startX, startY)` with
 *   `0 <= startX <= columns - winLength` and `0 <= startY <= rows - winLength`,
 *   an ascending diagonal from `(startX, startY)` and a descending diagonal
 *   from `(columns - 1 - startX, startY)`, each running until it leaves the
 *   board.
 *
 * The diagonal start offsets cover the lowest cell of every diagonal run of
 * length `winLength`, so any run on the board lies on one of the lines.
 * Lines depend only on the configuration, never on the board contents.
 */
export function enumerateLines(config: GameConfig): Position[][] {
  const { columns, rows, winLength } = config;
  const lines: Position[][] = [];

  for (let x = 0; x < columns; x++) {
    lines.push(Array.from({ length: rows }, (_, y) => ({ x, y })));
  }

  for (let y = 0; y < rows; y++) {
    lines.push(Array.from({ length: columns }, (_, x) => ({ x, y })));
  }

  for (let startX = 0; startX <= columns - winLength; startX++) {
    for (let startY = 0; startY <= rows - winLength; startY++) {
      lines.push(walkDiagonal(config, { x: startX, y: startY }, 1));
      lines.push(walkDiagonal(config, { x: columns - 1 - startX, y: startY }, -1));
    }
  }

  return lines;
}

function walkDiagonal(config: GameConfig, start: Position, dx: 1 | -1): Position[] {
  const line: Position[] = [];
  let x = start.x;
  let y = start.y;
  while (x >= 0 && x < config.columns && y < config.rows) {
    line.push({ x, y });
    x += dx;
    y += 1;
  }
  return line;
}

/**
 * Return the first `winLength` consecutive cells along `line` owned by
 * `player`, or null. Empty cells break a run like opponent discs do.
 */
export function findRunInLine(
  board: BoardState,
  line: Position[],
  player: Player,
  winLength: number
): Position[] | null {
  let run = 0;
  for (let i = 0; i < line.length; i++) {
    const { x, y } = line[i];
    run = getCell(board, x, y) === player ? run + 1 : 0;
    if (run === winLength) {
      return line.slice(i + 1 - winLength, i + 1);
    }
  }
  return null;
}

/**
 * Find a winning run for `player` anywhere on the board.
 *
 * @param lines lines to scan; callers checking the same board repeatedly pass
 *   the result of {@link enumerateLines} once instead of re-deriving it.
 * @returns the cells of the first run found, in line order, or null when the
 *   player has no run of the configured length.
 */
export function findWinningLine(
  board: BoardState,
  player: Player,
  lines: readonly Position[][] = enumerateLines(board.config)
): Position[] | null {
  const { winLength } = board.config;
  for (const line of lines) {
    const run = findRunInLine(board, line, player, winLength);
    if (run) {
      return run;
    }
  }
  return null;
}

export function hasWinningLine(
  board: BoardState,
  player: Player,
  lines: readonly Position[][] = enumerateLines(board.config)
): boolean {
  return findWinningLine(board, player, lines) !== null;
}
