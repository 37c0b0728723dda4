/**
 * Tests for PuzzleErrors - structured error types for the puzzle engine
 */

import {
  PuzzleError,
  PuzzleErrorCode,
  InvalidArgumentError,
  IndexOutOfRangeError,
  ValueOutOfRangeError,
  MalformedEncodingError,
  IllegalMoveError,
  isPuzzleError,
  isInvalidArgument,
  isIndexOutOfRange,
  isValueOutOfRange,
  isMalformedEncoding,
  isIllegalMove,
  toMalformedEncoding,
  wrapPuzzleError,
} from '../../src/shared/engine/errors';

describe('PuzzleErrors', () => {
  describe('specific error classes', () => {
    it('carries code, domain and context', () => {
      const err = new IndexOutOfRangeError(4, 1, 3);
      expect(err).toBeInstanceOf(PuzzleError);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe('IndexOutOfRangeError');
      expect(err.code).toBe(PuzzleErrorCode.BOARD_INDEX_OUT_OF_RANGE);
      expect(err.domain).toBe('Board');
      expect(err.message).toBe('Cell (4, 1) is out of bounds (valid: 0-2, 0-2)');
      expect(err.context).toEqual({ row: 4, col: 1, side: 3 });
    });

    it('formats value range errors', () => {
      const err = new ValueOutOfRangeError(9, 3, { row: 0, col: 0 });
      expect(err.message).toBe('Value needs to be between 0 and 8, got 9');
      expect(err.context).toEqual({ value: 9, side: 3, row: 0, col: 0 });
    });

    it('names the direction of an illegal move', () => {
      const err = new IllegalMoveError('left');
      expect(err.message).toBe('Blank cannot move left');
      expect(err.direction).toBe('left');
      expect(err.category).toBe('Illegal move');
    });

    it('serializes to JSON', () => {
      const err = new MalformedEncodingError('bad line', { line: 2 });
      const json = err.toJSON();
      expect(json).toMatchObject({
        error: true,
        type: 'MalformedEncodingError',
        code: 'ENCODING_MALFORMED',
        message: 'bad line',
        domain: 'Notation',
        context: { line: 2 },
        category: 'Malformed encoding',
      });
      expect(json.timestamp).toBe(err.timestamp.toISOString());
    });
  });

  describe('type guards', () => {
    it('match only their own class', () => {
      const invalid = new InvalidArgumentError('nope');
      const illegal = new IllegalMoveError('up');
      expect(isPuzzleError(invalid)).toBe(true);
      expect(isInvalidArgument(invalid)).toBe(true);
      expect(isIllegalMove(invalid)).toBe(false);
      expect(isIllegalMove(illegal)).toBe(true);
      expect(isIndexOutOfRange(new IndexOutOfRangeError(0, 9, 2))).toBe(true);
      expect(isValueOutOfRange(new ValueOutOfRangeError(9, 2))).toBe(true);
      expect(isMalformedEncoding(new MalformedEncodingError('x'))).toBe(true);
      expect(isPuzzleError(new Error('plain'))).toBe(false);
    });
  });

  describe('toMalformedEncoding', () => {
    it('returns a malformed error unchanged when there is no extra context', () => {
      const err = new MalformedEncodingError('x');
      expect(toMalformedEncoding(err)).toBe(err);
    });

    it('merges extra context into a new error', () => {
      const err = new MalformedEncodingError('x', { index: 1 });
      const merged = toMalformedEncoding(err, { line: 4 });
      expect(merged).not.toBe(err);
      expect(merged.context).toEqual({ index: 1, line: 4 });
    });

    it('records the code of other puzzle errors as the cause', () => {
      const merged = toMalformedEncoding(new ValueOutOfRangeError(7, 2));
      expect(merged.message).toBe('Value needs to be between 0 and 3, got 7');
      expect(merged.context).toEqual({ cause: PuzzleErrorCode.BOARD_VALUE_OUT_OF_RANGE });
    });
  });

  describe('wrapPuzzleError', () => {
    it('passes puzzle errors through', () => {
      const err = new IllegalMoveError('down');
      expect(wrapPuzzleError(err)).toBe(err);
    });

    it('wraps foreign errors and strings', () => {
      const wrapped = wrapPuzzleError(new TypeError('boom'), 'Solver', { depth: 3 });
      expect(wrapped.message).toBe('boom');
      expect(wrapped.domain).toBe('Solver');
      expect(wrapped.context.depth).toBe(3);
      expect(typeof wrapped.context.originalStack).toBe('string');

      expect(wrapPuzzleError('text').message).toBe('text');
    });
  });
});
