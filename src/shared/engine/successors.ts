import type { Direction } from '../types/puzzle';
import type { PuzzleState } from './PuzzleState';

/**
 * Successor enumeration for search callers.
 */

export interface Successor {
  /** Direction the blank moved to reach `state`. */
  direction: Direction;
  state: PuzzleState;
}

/**
 * Every state one move away from `state`, in up/down/left/right order.
 * Returns 2-4 states for side ≥ 2 and none for side 1.
 */
export function legalMoves(state: PuzzleState): PuzzleState[] {
  return state.legalMoves();
}

/**
 * Like `legalMoves`, but keeps the direction that produced each successor.
 */
export function enumerateSuccessors(state: PuzzleState): Successor[] {
  return state.legalDirections().map((direction) => ({
    direction,
    state: state.withMove(direction),
  }));
}
