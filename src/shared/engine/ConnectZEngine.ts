import { BoardState, GameConfig, GameResult, Position, resultForPlayer } from '../types/game';
import { createEmptyBoard, dropDisc, getOpponent, isBoardFull, playerAt } from './boardState';
import { parseGameRecord } from './gameRecordParser';
import { enumerateLines, findWinningLine, hasWinningLine } from './lineDetection';
import {
  EngineStatus,
  GameConclusion,
  GameFailure,
  GameFailureKind,
  ReplayOptions,
  ReplayOutcome,
  fail,
} from './types';

/**
 * Replays a recorded Connect-Z game and classifies it.
 *
 * Each instance owns its board and validates exactly one game. Lifecycle:
 *
 *   initialized → in_progress → concluded | failed
 *
 * Per move, in order: reject the move if the previous mover already has a
 * winning line, then validate the column reference and capacity, then place
 * the disc. Once the log is exhausted the last mover is checked for a win,
 * then the board for a draw; anything else means the log stops before the
 * game was decided.
 */
export class ConnectZEngine {
  private readonly board: BoardState;
  /** Lines depend only on the configuration, so they are derived once. */
  private readonly lines: Position[][];
  private status: EngineStatus = { phase: 'initialized' };

  constructor(
    config: GameConfig,
    private readonly options: ReplayOptions = {}
  ) {
    this.board = createEmptyBoard(config);
    this.lines = enumerateLines(config);
  }

  public getStatus(): EngineStatus {
    return this.status;
  }

  public getBoard(): BoardState {
    return this.board;
  }

  /**
   * Replay `moves` (1-based columns) from the empty board. The outcome is
   * computed once; calling again returns the stored outcome.
   */
  public replay(moves: readonly number[]): ReplayOutcome {
    if (this.status.phase === 'concluded') {
      return this.status.outcome;
    }
    if (this.status.phase === 'failed') {
      return this.status.failure;
    }

    this.status = { phase: 'in_progress', movesApplied: 0 };

    for (let moveIndex = 0; moveIndex < moves.length; moveIndex++) {
      const player = playerAt(moveIndex);
      const column = moves[moveIndex];

      if (hasWinningLine(this.board, getOpponent(player), this.lines)) {
        return this.failWith(
          fail(GameFailureKind.TOO_MANY_MOVES, 'There are more moves after end of the game', {
            moveIndex,
            context: { column },
          })
        );
      }

      const placed = dropDisc(this.board, player, column);
      if (!placed.ok) {
        return this.failWith({ ...placed, moveIndex });
      }

      this.status = { phase: 'in_progress', movesApplied: moveIndex + 1 };
      this.options.onMove?.({ moveIndex, player, column, row: placed.data });
    }

    return this.conclude(moves.length);
  }

  private conclude(moveCount: number): ReplayOutcome {
    if (moveCount > 0) {
      const lastMover = playerAt(moveCount - 1);
      const winningLine = findWinningLine(this.board, lastMover, this.lines);
      if (winningLine) {
        return this.concludeWith({
          ok: true,
          result: resultForPlayer(lastMover),
          moveCount,
          winningLine,
        });
      }
    }

    if (isBoardFull(this.board)) {
      return this.concludeWith({ ok: true, result: GameResult.DRAW, moveCount });
    }

    return this.failWith(
      fail(GameFailureKind.MISSING_RESULT, 'There is no result after all moves were done', {
        context: { moveCount },
      })
    );
  }

  private concludeWith(outcome: GameConclusion): GameConclusion {
    this.status = { phase: 'concluded', outcome };
    return outcome;
  }

  private failWith(failure: GameFailure): GameFailure {
    this.status = { phase: 'failed', failure };
    return failure;
  }
}

/**
 * Validate a complete game log given as text records: parse, check the
 * configuration, then replay.
 */
export function validateGameLog(lines: Iterable<string>, options: ReplayOptions = {}): ReplayOutcome {
  const record = parseGameRecord(lines);
  if (!record.ok) {
    return record;
  }
  return new ConnectZEngine(record.data.config, options).replay(record.data.moves);
}
