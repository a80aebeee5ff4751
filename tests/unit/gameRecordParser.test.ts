import {
  parseConfigLine,
  parseGameRecord,
  parseGameRecordText,
  parseInteger,
  splitRecords,
} from '../../src/shared/engine/gameRecordParser';
import { GameFailureKind, isFailure } from '../../src/shared/engine/types';

describe('gameRecordParser', () => {
  describe('parseInteger', () => {
    it('accepts plain, signed and padded integers', () => {
      expect(parseInteger('7')).toBe(7);
      expect(parseInteger('  12 ')).toBe(12);
      expect(parseInteger('+3')).toBe(3);
      expect(parseInteger('-1')).toBe(-1);
      expect(parseInteger('0')).toBe(0);
    });

    it('rejects non-integer tokens', () => {
      expect(parseInteger('')).toBeNull();
      expect(parseInteger('1.5')).toBeNull();
      expect(parseInteger('abc')).toBeNull();
      expect(parseInteger('1 2')).toBeNull();
    });

    it('parses integers too large for a board instead of rejecting them', () => {
      expect(parseInteger('99999999999999999999')).toBe(1e20);
      expect(parseInteger('-99999999999999999999')).toBe(-1e20);
    });
  });

  describe('parseConfigLine', () => {
    it('reads three whitespace-separated integers', () => {
      expect(parseConfigLine('7 6\t4')).toEqual({
        ok: true,
        data: { columns: 7, rows: 6, winLength: 4 },
      });
    });

    it('rejects a header with too few or too many values', () => {
      const tooFew = parseConfigLine('7 6');
      const tooMany = parseConfigLine('7 6 4 1');

      expect(isFailure(tooFew) && tooFew.kind).toBe(GameFailureKind.PARSING_PROBLEM);
      expect(isFailure(tooMany) && tooMany.kind).toBe(GameFailureKind.PARSING_PROBLEM);
    });

    it('rejects a non-numeric header value', () => {
      const result = parseConfigLine('7 six 4');
      expect(result).toEqual({
        ok: false,
        kind: GameFailureKind.PARSING_PROBLEM,
        reason: 'Problem with parsing input stream: "six" is not an integer',
        context: { lineNumber: 1 },
      });
    });
  });

  describe('parseGameRecord', () => {
    it('parses the header and moves', () => {
      const result = parseGameRecord(['3 1 3', '1', '2', '3']);
      expect(result).toEqual({
        ok: true,
        data: { config: { columns: 3, rows: 1, winLength: 3 }, moves: [1, 2, 3] },
      });
    });

    it('treats a header-only log as a game with no moves', () => {
      const result = parseGameRecord(['1 1 1']);
      expect(result.ok && result.data.moves).toEqual([]);
    });

    it('reports empty input as a parsing problem', () => {
      const result = parseGameRecord([]);
      expect(isFailure(result) && result.reason).toBe(
        'Problem with parsing input stream: input is empty'
      );
    });

    it('reports a malformed move line with its line number', () => {
      const result = parseGameRecord(['2 2 2', '1', 'x']);
      expect(result).toEqual({
        ok: false,
        kind: GameFailureKind.PARSING_PROBLEM,
        reason: 'Problem with parsing input stream: "x" is not an integer',
        context: { lineNumber: 3 },
      });
    });

    it('ignores trailing blank lines', () => {
      const result = parseGameRecord(['2 2 2', '1', '2', '', '   ']);
      expect(result.ok && result.data.moves).toEqual([1, 2]);
    });

    it('rejects a blank line followed by further moves', () => {
      const result = parseGameRecord(['2 2 2', '1', '', '2']);
      expect(isFailure(result) && result.reason).toBe(
        'Problem with parsing input stream: blank line 3 is followed by further moves'
      );
    });

    it('rejects an invalid configuration after parsing', () => {
      const result = parseGameRecord(['3 2 4', '1']);
      expect(result).toEqual({
        ok: false,
        kind: GameFailureKind.INVALID_CONFIGURATION,
        reason: 'Illegal game x=3 y=2 z=4',
        context: { columns: 3, rows: 2, winLength: 4 },
      });
    });

    it('reports a malformed move ahead of an invalid configuration', () => {
      const result = parseGameRecord(['3 2 4', 'oops']);
      expect(isFailure(result) && result.kind).toBe(GameFailureKind.PARSING_PROBLEM);
    });

    it('passes out-of-range columns through for the engine to judge', () => {
      const result = parseGameRecord(['2 2 2', '0', '-4', '9']);
      expect(result.ok && result.data.moves).toEqual([0, -4, 9]);
    });
  });

  describe('splitRecords', () => {
    it('splits on LF and CRLF and keeps trailing empty records', () => {
      expect(splitRecords('1 1 1\r\n1\n')).toEqual(['1 1 1', '1', '']);
    });

    it('returns no records for empty text', () => {
      expect(splitRecords('')).toEqual([]);
    });
  });

  describe('parseGameRecordText', () => {
    it('splits LF and CRLF input', () => {
      expect(parseGameRecordText('2 2 2\n1\n2\n').ok).toBe(true);
      const crlf = parseGameRecordText('2 2 2\r\n1\r\n2\r\n');
      expect(crlf.ok && crlf.data.moves).toEqual([1, 2]);
    });

    it('reports an empty string as a parsing problem', () => {
      const result = parseGameRecordText('');
      expect(isFailure(result) && result.kind).toBe(GameFailureKind.PARSING_PROBLEM);
    });
  });
});
