/**
 * Core data model for Connect-Z game records.
 *
 * A Connect-Z game is played on `columns` × `rows` cells; discs are dropped
 * into columns and stack from row 0 upwards. The first player to line up
 * `winLength` discs horizontally, vertically or diagonally wins.
 */

/**
 * The two seats in a game. Numeric values match the exit codes used for the
 * corresponding win result.
 */
export enum Player {
  FIRST = 1,
  SECOND = 2,
}

/**
 * Terminal result of a legal, finished game.
 */
export enum GameResult {
  DRAW = 0,
  FIRST_WON = 1,
  SECOND_WON = 2,
}

/**
 * Board dimensions and win condition parsed from the first record of a
 * game log (`X Y Z`).
 */
export interface GameConfig {
  /** Number of columns (X). */
  readonly columns: number;
  /** Number of rows (Y); the capacity of every column. */
  readonly rows: number;
  /** Run length (Z) needed to win. */
  readonly winLength: number;
}

/**
 * A 0-based board coordinate. `x` is the column, `y` the row counted from
 * the bottom of the column.
 */
export interface Position {
  x: number;
  y: number;
}

/** Content of a single cell: the owning player, or null when empty. */
export type Cell = Player | null;

/**
 * Column-major board. `columns[x]` holds the discs dropped into column `x`,
 * bottom first; a column never grows beyond `config.rows` entries.
 */
export interface BoardState {
  readonly config: GameConfig;
  readonly columns: Player[][];
}

/** Parsed game log: configuration plus 1-based column moves. */
export interface GameRecord {
  config: GameConfig;
  moves: number[];
}

export const positionToString = (pos: Position): string => `${pos.x},${pos.y}`;

/**
 * Map a winning player to the corresponding game result.
 */
export function resultForPlayer(player: Player): GameResult {
  return player === Player.FIRST ? GameResult.FIRST_WON : GameResult.SECOND_WON;
}
