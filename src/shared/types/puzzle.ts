/**
 * Shared types for the sliding-tile puzzle engine.
 *
 * Coordinates are (row, col) with row 0 at the top and col 0 on the left.
 * Cell value 0 is the blank.
 */

/**
 * Direction of a move, named after where the blank travels. `up` moves the
 * blank one row toward row 0, swapping it with the tile above.
 */
export type Direction = 'up' | 'down' | 'left' | 'right';

export interface Position {
  row: number;
  col: number;
}

/**
 * Concrete cell storage layouts. The set is closed: `array` works for any
 * side, `packed` only for boards of up to 16 cells.
 */
export type CellStorageKind = 'array' | 'packed';

/** Storage preference at construction time. `auto` picks per side. */
export type CellStoragePreference = CellStorageKind | 'auto';

export interface PuzzleStateOptions {
  storage?: CellStoragePreference;
}

/**
 * Plain-data view of a state, used by the JSON contract and diagnostics.
 * `cells` is row-major and has `side * side` entries.
 */
export interface PuzzleSnapshot {
  side: number;
  moveCount: number;
  cells: number[];
}

/**
 * Read-only view of a board, enough to format or hash it without depending
 * on the concrete state class.
 */
export interface CellGrid {
  readonly side: number;
  getValue(row: number, col: number): number;
}
