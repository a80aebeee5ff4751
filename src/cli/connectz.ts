#!/usr/bin/env node
/**
 * Validate a recorded Connect-Z game and report its outcome as the process
 * exit code.
 *
 * Usage:
 *
 *   connectz <input-file-path>
 *
 * Exit codes: 0 draw, 1 first player won, 2 second player won, 3 no result
 * after the last move, 4 moves after the game ended, 5 column full,
 * 6 column out of range, 7 invalid board configuration, 8 malformed input,
 * 9 input file missing or unreadable. A wrong argument count prints a usage
 * line and exits with 2 without opening any file.
 */

import * as path from 'path';

import { splitRecords, validateGameLog, type MoveAppliedEvent, type ReplayOptions } from '../shared/engine';
import { GameErrorCode, isGameError, wrapError } from '../shared/errors';
import { config } from './config';
import { exitCodeForError, exitCodeForOutcome, USAGE_EXIT_CODE } from './exitCodes';
import { readGameLogText } from './io/gameLogReader';
import { logger, type LogMeta } from './utils/logger';

function printUsage(programName: string): void {
  console.log(`${programName}: Provide one input file`);
}

function buildReplayOptions(filePath: string): ReplayOptions {
  if (!config.diagnostics.traceMoves) {
    return {};
  }
  return {
    onMove: (event: MoveAppliedEvent) => {
      logger.debug('Move applied', { filePath, ...event });
    },
  };
}

/**
 * Run the validator for the given arguments and return the exit code.
 */
export function main(
  argv: string[] = process.argv.slice(2),
  programName: string = path.basename(process.argv[1] ?? 'connectz')
): number {
  if (argv.length !== 1) {
    printUsage(programName);
    return USAGE_EXIT_CODE;
  }

  const [filePath] = argv;

  try {
    const lines = splitRecords(readGameLogText(filePath));
    const outcome = validateGameLog(lines, buildReplayOptions(filePath));
    const exitCode = exitCodeForOutcome(outcome);

    if (outcome.ok) {
      logger.info('Game concluded', {
        filePath,
        result: outcome.result,
        moveCount: outcome.moveCount,
        winningLine: outcome.winningLine,
        exitCode,
      });
    } else {
      const meta: LogMeta = { filePath, kind: outcome.kind, exitCode };
      if (outcome.moveIndex !== undefined) {
        meta.moveIndex = outcome.moveIndex;
      }
      logger.info(`Game log rejected: ${outcome.reason}`, { ...meta, ...outcome.context });
    }

    return exitCode;
  } catch (err) {
    const exitCode = exitCodeForError(err);
    if (isGameError(err) && err.code === GameErrorCode.INPUT_UNREADABLE) {
      logger.warn(err.message, { exitCode, ...err.context });
    } else {
      logger.error('Unexpected failure while validating game log', {
        filePath,
        exitCode,
        error: wrapError(err).toJSON(),
      });
    }
    return exitCode;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
