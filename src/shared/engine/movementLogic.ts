import type { Direction, Position } from '../types/puzzle';

/**
 * Board geometry for blank moves.
 *
 * Everything here is a pure function of the side and the blank position, so
 * the move engine and search callers can check legality without attempting
 * a move and catching the failure.
 */

/** Fixed enumeration order for successor generation. */
export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'] as const;

export const DIRECTION_DELTAS: Readonly<Record<Direction, { dRow: number; dCol: number }>> = {
  up: { dRow: -1, dCol: 0 },
  down: { dRow: 1, dCol: 0 },
  left: { dRow: 0, dCol: -1 },
  right: { dRow: 0, dCol: 1 },
};

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

/** The move that undoes `direction`. */
export function oppositeDirection(direction: Direction): Direction {
  return OPPOSITES[direction];
}

/**
 * Whether the blank at `blank` can move in `direction` on a board of `side`.
 */
export function canMoveBlank(side: number, blank: Position, direction: Direction): boolean {
  switch (direction) {
    case 'up':
      return blank.row > 0;
    case 'down':
      return blank.row < side - 1;
    case 'left':
      return blank.col > 0;
    case 'right':
      return blank.col < side - 1;
  }
}

/** Directions available to the blank, in DIRECTIONS order. */
export function legalBlankDirections(side: number, blank: Position): Direction[] {
  return DIRECTIONS.filter((direction) => canMoveBlank(side, blank, direction));
}

/** Cell the blank lands on. Callers check legality first. */
export function blankTarget(blank: Position, direction: Direction): Position {
  const { dRow, dCol } = DIRECTION_DELTAS[direction];
  return { row: blank.row + dRow, col: blank.col + dCol };
}
