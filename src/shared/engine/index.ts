// =============================================================================
// SLIDING PUZZLE ENGINE - PUBLIC API
// =============================================================================
// Search and solver code should only import from this file.
// =============================================================================

// Types
export type {
  CellGrid,
  CellStorageKind,
  CellStoragePreference,
  Direction,
  Position,
  PuzzleSnapshot,
  PuzzleStateOptions,
} from '../types/puzzle';

// State
export { PuzzleState } from './PuzzleState';
export { PACKED_MAX_SIDE } from './cellStorage';

// Moves
export {
  DIRECTIONS,
  oppositeDirection,
  canMoveBlank,
  legalBlankDirections,
} from './movementLogic';
export { legalMoves, enumerateSuccessors, type Successor } from './successors';

// Canonical form & codec
export { fingerprintCells, hashCells } from './hashing';
export { formatLine, formatBoard, parseLineTokens } from './notation';
export {
  PuzzleSnapshotSchema,
  serializePuzzleState,
  deserializePuzzleState,
  encodeLines,
  decodeLines,
  type SerializedPuzzleState,
} from './contracts/serialization';
export { StateSet } from './StateSet';

// Errors
export {
  PuzzleErrorCode,
  PuzzleError,
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
  wrapPuzzleError,
  type PuzzleErrorJSON,
} from './errors';
