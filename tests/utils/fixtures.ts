/**
 * Test Fixtures and Utilities
 * Common boards and fast-check arbitraries for puzzle engine tests
 */

import fc from 'fast-check';
import { PuzzleState } from '../../src/shared/engine/PuzzleState';
import { DIRECTIONS } from '../../src/shared/engine/movementLogic';
import type { CellStoragePreference, Direction } from '../../src/shared/types/puzzle';

/**
 * Builds a state from rows of values, e.g. `fromRows([[1, 2], [0, 3]])`.
 */
export function fromRows(
  rows: number[][],
  moveCount: number = 0,
  storage: CellStoragePreference = 'auto'
): PuzzleState {
  return PuzzleState.fromCells(rows.length, rows.flat(), moveCount, { storage });
}

/**
 * Apply each direction that is legal at that point; illegal ones are skipped.
 */
export function walk(start: PuzzleState, directions: readonly Direction[]): PuzzleState {
  const state = PuzzleState.copyOf(start);
  for (const direction of directions) {
    if (state.canMove(direction)) {
      state.applyMove(direction);
    }
  }
  return state;
}

export const arbDirection: fc.Arbitrary<Direction> = fc.constantFrom(...DIRECTIONS);

export const arbStorage: fc.Arbitrary<'array' | 'packed'> = fc.constantFrom('array', 'packed');

/**
 * Any valid state with side 1-4: a random permutation of the cells and an
 * arbitrary (possibly negative) move count.
 */
export const arbPuzzleState: fc.Arbitrary<PuzzleState> = fc
  .integer({ min: 1, max: 4 })
  .chain((side) => {
    const values = Array.from({ length: side * side }, (_, i) => i);
    return fc.tuple(
      fc.constant(side),
      fc.shuffledSubarray(values, { minLength: values.length, maxLength: values.length }),
      fc.integer({ min: -1000, max: 1000 }),
      arbStorage
    );
  })
  .map(([side, cells, moveCount, storage]) =>
    PuzzleState.fromCells(side, cells, moveCount, { storage })
  );

/**
 * A state reached from the solved board of side 2-5 by a random walk.
 */
export const arbWalkedState: fc.Arbitrary<PuzzleState> = fc
  .tuple(fc.integer({ min: 2, max: 5 }), fc.array(arbDirection, { maxLength: 40 }))
  .map(([side, directions]) => walk(PuzzleState.fromSide(side, { storage: 'array' }), directions));
