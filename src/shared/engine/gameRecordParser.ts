import { GameConfig, GameRecord } from '../types/game';
import { validateGameConfig } from './rulesConfig';
import { GameFailureKind, GameFailure, StepOutcome, fail, succeed } from './types';

const INTEGER_PATTERN = /^[+-]?\d+$/;

const PARSE_FAILURE_PREFIX = 'Problem with parsing input stream';

function parseFailure(detail: string, lineNumber: number): GameFailure {
  return fail(GameFailureKind.PARSING_PROBLEM, `${PARSE_FAILURE_PREFIX}: ${detail}`, {
    context: { lineNumber },
  });
}

/**
 * Parse a single integer token. Surrounding whitespace and a leading sign are
 * accepted; anything else is rejected. Integers of any magnitude parse; the
 * board checks reject values too large to be a column or dimension.
 */
export function parseInteger(token: string): number | null {
  const trimmed = token.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}

/**
 * Parse the `X Y Z` header record into an (unvalidated) configuration.
 */
export function parseConfigLine(line: string): StepOutcome<GameConfig> {
  const tokens = line.trim().split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length !== 3) {
    return parseFailure(`expected 3 integers on the first line, found ${tokens.length} values`, 1);
  }

  const values: number[] = [];
  for (const token of tokens) {
    const value = parseInteger(token);
    if (value === null) {
      return parseFailure(`"${token}" is not an integer`, 1);
    }
    values.push(value);
  }

  const [columns, rows, winLength] = values;
  return succeed({ columns, rows, winLength });
}

/**
 * Parse a game log given as a sequence of text records.
 *
 * The first record holds `X Y Z`; every following record holds one 1-based
 * column index. Blank records at the end of the input are ignored, a blank
 * record with moves after it is a parsing problem.
 *
 * The whole stream is parsed before the configuration invariant is checked,
 * so a malformed move record is reported ahead of an invalid configuration.
 */
export function parseGameRecord(lines: Iterable<string>): StepOutcome<GameRecord> {
  const iterator = lines[Symbol.iterator]();
  const header = iterator.next();
  if (header.done) {
    return parseFailure('input is empty', 1);
  }

  const parsedConfig = parseConfigLine(header.value);
  if (!parsedConfig.ok) {
    return parsedConfig;
  }

  const moves: number[] = [];
  let firstBlankLine: number | null = null;
  let lineNumber = 1;

  for (let next = iterator.next(); !next.done; next = iterator.next()) {
    lineNumber += 1;
    const line = next.value;

    if (line.trim().length === 0) {
      if (firstBlankLine === null) {
        firstBlankLine = lineNumber;
      }
      continue;
    }
    if (firstBlankLine !== null) {
      return parseFailure(`blank line ${firstBlankLine} is followed by further moves`, firstBlankLine);
    }

    const column = parseInteger(line);
    if (column === null) {
      return parseFailure(`"${line.trim()}" is not an integer`, lineNumber);
    }
    moves.push(column);
  }

  const config = validateGameConfig(parsedConfig.data);
  if (!config.ok) {
    return config;
  }

  return succeed({ config: config.data, moves });
}

/**
 * Split raw text into records. Accepts both LF and CRLF line endings.
 */
export function splitRecords(text: string): string[] {
  return text.length === 0 ? [] : text.split(/\r?\n/);
}

export function parseGameRecordText(text: string): StepOutcome<GameRecord> {
  return parseGameRecord(splitRecords(text));
}
