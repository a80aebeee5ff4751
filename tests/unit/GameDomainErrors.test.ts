/**
 * Tests for GameDomainErrors - Structured error types raised at the I/O boundary
 * @module tests/unit/GameDomainErrors.test
 */

import {
  GameError,
  GameErrorCode,
  InputUnreadableError,
  isGameError,
  wrapError,
  type GameErrorJSON,
} from '../../src/shared/errors';

describe('GameDomainErrors', () => {
  describe('GameError', () => {
    it('should carry code, message and context', () => {
      const error = new GameError(GameErrorCode.INTERNAL_ERROR, 'Something broke', { step: 'replay' });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(GameError);
      expect(error.name).toBe('GameError');
      expect(error.code).toBe(GameErrorCode.INTERNAL_ERROR);
      expect(error.message).toBe('Something broke');
      expect(error.context).toEqual({ step: 'replay' });
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should serialize to JSON', () => {
      const error = new GameError(GameErrorCode.INTERNAL_ERROR, 'Something broke');
      const json: GameErrorJSON = error.toJSON();

      expect(json).toEqual({
        error: true,
        code: 'INTERNAL_ERROR',
        message: 'Something broke',
        context: {},
        timestamp: error.timestamp.toISOString(),
      });
    });
  });

  describe('InputUnreadableError', () => {
    it('should describe the file and reason', () => {
      const error = new InputUnreadableError('games/final.txt', 'ENOENT', { errno: 'ENOENT' });

      expect(error).toBeInstanceOf(GameError);
      expect(error).toBeInstanceOf(InputUnreadableError);
      expect(error.name).toBe('InputUnreadableError');
      expect(error.code).toBe(GameErrorCode.INPUT_UNREADABLE);
      expect(error.message).toBe('Cannot read game log games/final.txt: ENOENT');
      expect(error.context).toEqual({
        filePath: 'games/final.txt',
        reason: 'ENOENT',
        errno: 'ENOENT',
      });
    });
  });

  describe('isGameError', () => {
    it('should distinguish GameError instances', () => {
      expect(isGameError(new InputUnreadableError('x', 'EISDIR'))).toBe(true);
      expect(isGameError(new Error('plain'))).toBe(false);
      expect(isGameError('not an error')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('should return GameErrors unchanged', () => {
      const error = new InputUnreadableError('x', 'EACCES');
      expect(wrapError(error)).toBe(error);
    });

    it('should wrap plain errors as internal errors', () => {
      const original = new Error('boom');
      const wrapped = wrapError(original, { filePath: 'game.txt' });

      expect(wrapped.code).toBe(GameErrorCode.INTERNAL_ERROR);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.context).toEqual({ filePath: 'game.txt', originalStack: original.stack });
    });

    it('should wrap non-error values', () => {
      const wrapped = wrapError('string failure');
      expect(wrapped.message).toBe('string failure');
      expect(wrapped.context).toEqual({ originalStack: undefined });
    });
  });
});
