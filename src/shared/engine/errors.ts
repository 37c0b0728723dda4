/**
 * Puzzle Engine Errors - Structured error types for the puzzle state core
 *
 * Every failure raised by the engine is a `PuzzleError` carrying a stable
 * code, a context record for debugging, and the domain that raised it.
 *
 * Error Categories:
 * - **InvalidArgument**: bad side size or other malformed call arguments
 * - **IndexOutOfRange**: a coordinate outside `[0, side)`
 * - **ValueOutOfRange**: a tile value outside `[0, side²)`
 * - **MalformedEncoding**: text or JSON that fails structural or semantic checks
 * - **IllegalMove**: a move that would push the blank off the board
 *
 * `IllegalMove` is an expected outcome for callers probing directions; the
 * others indicate programmer or input errors.
 *
 * Usage:
 * ```typescript
 * import { IllegalMoveError, isIllegalMove } from './errors';
 *
 * try {
 *   state.applyMove('up');
 * } catch (err) {
 *   if (!isIllegalMove(err)) throw err;
 * }
 * ```
 *
 * @module PuzzleErrors
 */

import type { Direction } from '../types/puzzle';

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all puzzle engine error codes.
 *
 * Error codes are prefixed by category:
 * - ARGUMENT_*: invalid call arguments
 * - BOARD_*: coordinate or tile value outside the board's range
 * - ENCODING_*: line or JSON encoding failures
 * - MOVE_*: move legality
 */
export enum PuzzleErrorCode {
  /** Side size is not a positive integer, or another argument is unusable */
  ARGUMENT_INVALID = 'ARGUMENT_INVALID',
  /** Row or column outside [0, side) */
  BOARD_INDEX_OUT_OF_RANGE = 'BOARD_INDEX_OUT_OF_RANGE',
  /** Tile value outside [0, side²) */
  BOARD_VALUE_OUT_OF_RANGE = 'BOARD_VALUE_OUT_OF_RANGE',
  /** Encoded state failed validation */
  ENCODING_MALFORMED = 'ENCODING_MALFORMED',
  /** Blank cannot move in the requested direction */
  MOVE_ILLEGAL = 'MOVE_ILLEGAL',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  ARGUMENT_: 'Invalid argument',
  BOARD_: 'Board range violation',
  ENCODING_: 'Malformed encoding',
  MOVE_: 'Illegal move',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all puzzle engine errors.
 */
export class PuzzleError extends Error {
  /** Error code for programmatic handling */
  readonly code: PuzzleErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'State', 'Notation') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: PuzzleErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Puzzle'
  ) {
    super(message);
    this.name = 'PuzzleError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, PuzzleError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): PuzzleErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a PuzzleError.
 */
export interface PuzzleErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown for a non-positive side size, a non-integer argument where an
 * integer is required, or cells that do not form a permutation.
 */
export class InvalidArgumentError extends PuzzleError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'State') {
    super(PuzzleErrorCode.ARGUMENT_INVALID, message, context, domain);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

export class IndexOutOfRangeError extends PuzzleError {
  constructor(row: number, col: number, side: number, context: Record<string, unknown> = {}) {
    super(
      PuzzleErrorCode.BOARD_INDEX_OUT_OF_RANGE,
      `Cell (${row}, ${col}) is out of bounds (valid: 0-${side - 1}, 0-${side - 1})`,
      { row, col, side, ...context },
      'Board'
    );
    this.name = 'IndexOutOfRangeError';
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype);
  }
}

export class ValueOutOfRangeError extends PuzzleError {
  constructor(value: number, side: number, context: Record<string, unknown> = {}) {
    super(
      PuzzleErrorCode.BOARD_VALUE_OUT_OF_RANGE,
      `Value needs to be between 0 and ${side * side - 1}, got ${value}`,
      { value, side, ...context },
      'Board'
    );
    this.name = 'ValueOutOfRangeError';
    Object.setPrototypeOf(this, ValueOutOfRangeError.prototype);
  }
}

/**
 * Thrown by the line and JSON decoders. No partial state is ever returned
 * alongside this error.
 */
export class MalformedEncodingError extends PuzzleError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(PuzzleErrorCode.ENCODING_MALFORMED, message, context, 'Notation');
    this.name = 'MalformedEncodingError';
    Object.setPrototypeOf(this, MalformedEncodingError.prototype);
  }
}

export class IllegalMoveError extends PuzzleError {
  readonly direction: Direction;

  constructor(direction: Direction, context: Record<string, unknown> = {}) {
    super(
      PuzzleErrorCode.MOVE_ILLEGAL,
      `Blank cannot move ${direction}`,
      { direction, ...context },
      'Move'
    );
    this.name = 'IllegalMoveError';
    this.direction = direction;
    Object.setPrototypeOf(this, IllegalMoveError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isPuzzleError(error: unknown): error is PuzzleError {
  return error instanceof PuzzleError;
}

export function isInvalidArgument(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}

export function isIndexOutOfRange(error: unknown): error is IndexOutOfRangeError {
  return error instanceof IndexOutOfRangeError;
}

export function isValueOutOfRange(error: unknown): error is ValueOutOfRangeError {
  return error instanceof ValueOutOfRangeError;
}

export function isMalformedEncoding(error: unknown): error is MalformedEncodingError {
  return error instanceof MalformedEncodingError;
}

export function isIllegalMove(error: unknown): error is IllegalMoveError {
  return error instanceof IllegalMoveError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Convert any error raised while decoding into a MalformedEncodingError,
 * preserving the original code and message in context. Puzzle errors that
 * are already MalformedEncodingError pass through unchanged.
 */
export function toMalformedEncoding(
  error: unknown,
  context: Record<string, unknown> = {}
): MalformedEncodingError {
  if (isMalformedEncoding(error)) {
    if (Object.keys(context).length === 0) {
      return error;
    }
    return new MalformedEncodingError(error.message, { ...error.context, ...context });
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = isPuzzleError(error) ? error.code : undefined;
  return new MalformedEncodingError(message, { ...context, cause });
}

/**
 * Wrap an unknown error in a PuzzleError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapPuzzleError(
  error: unknown,
  domain: string = 'Puzzle',
  context: Record<string, unknown> = {}
): PuzzleError {
  if (isPuzzleError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new PuzzleError(
    PuzzleErrorCode.ARGUMENT_INVALID,
    message,
    { ...context, originalStack: stack },
    domain
  );
}
