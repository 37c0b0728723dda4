import type {
  CellGrid,
  CellStorageKind,
  Direction,
  Position,
  PuzzleSnapshot,
  PuzzleStateOptions,
} from '../types/puzzle';
import { resolveConfig } from '../config/env';
import {
  PACKED_MAX_SIDE,
  createCellStorage,
  resolveStorageKind,
  type CellStorage,
} from './cellStorage';
import {
  IllegalMoveError,
  IndexOutOfRangeError,
  InvalidArgumentError,
  ValueOutOfRangeError,
} from './errors';
import { fingerprintCells, hashCells } from './hashing';
import { blankTarget, canMoveBlank, legalBlankDirections } from './movementLogic';
import { formatBoard, formatLine, parseLineTokens } from './notation';

/**
 * State of an N×N sliding-tile puzzle.
 *
 * Holds the board, the cached blank coordinates and a move counter. The
 * counter records history only: `equals` and `hashCode` look at the tiles
 * alone, so the same configuration reached by different paths is one search
 * node.
 *
 * States are independently owned values. Branching callers use `withMove`
 * (or `legalMoves`), which never touches the receiver; `applyMove` mutates in
 * place. Every operation validates before it mutates, so a thrown error
 * leaves the state exactly as it was.
 */
export class PuzzleState implements CellGrid {
  private readonly _side: number;
  private readonly _cellCount: number;
  private readonly cells: CellStorage;
  private _blankRow: number;
  private _blankCol: number;
  private _moveCount: number;

  private constructor(
    side: number,
    cells: CellStorage,
    blankRow: number,
    blankCol: number,
    moveCount: number
  ) {
    this._side = side;
    this._cellCount = side * side;
    this.cells = cells;
    this._blankRow = blankRow;
    this._blankCol = blankCol;
    this._moveCount = moveCount;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Construction
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * The solved board for `side`: 1..side²-1 in reading order, blank last.
   */
  static fromSide(side: number, options: PuzzleStateOptions = {}): PuzzleState {
    assertSide(side);
    const cellCount = side * side;
    const cells = createCellStorage(storageKindFor(side, options), cellCount);
    for (let i = 0; i < cellCount - 1; i++) {
      cells.set(i, i + 1);
    }
    cells.set(cellCount - 1, 0);
    return new PuzzleState(side, cells, side - 1, side - 1, 0);
  }

  /**
   * Independent copy of `other`. The storage layout is kept unless
   * `options.storage` asks for another one.
   */
  static copyOf(other: PuzzleState, options: PuzzleStateOptions = {}): PuzzleState {
    if (options.storage === undefined || options.storage === other.storageKind) {
      return new PuzzleState(
        other._side,
        other.cells.clone(),
        other._blankRow,
        other._blankCol,
        other._moveCount
      );
    }
    return PuzzleState.build(other._side, other.toCells(), other._moveCount, options);
  }

  /**
   * Build a state from row-major cell values, which must be a permutation of
   * `0..side²-1`.
   */
  static fromCells(
    side: number,
    cells: readonly number[],
    moveCount: number = 0,
    options: PuzzleStateOptions = {}
  ): PuzzleState {
    assertSide(side);
    assertMoveCount(moveCount);
    const cellCount = side * side;
    if (cells.length !== cellCount) {
      throw new InvalidArgumentError(
        `A side ${side} board needs ${cellCount} cells, got ${cells.length}`,
        { side, cellCount: cells.length }
      );
    }
    assertPermutation(side, cells);
    return PuzzleState.build(side, cells, moveCount, options);
  }

  /**
   * Parse the line encoding produced by `toLine()`.
   * @throws MalformedEncodingError for anything that is not a valid state.
   */
  static parseLine(text: string, options: PuzzleStateOptions = {}): PuzzleState {
    const { side, moveCount, cells } = parseLineTokens(text);
    return PuzzleState.build(side, cells, moveCount, options);
  }

  /** Assumes `cells` is already a validated permutation. */
  private static build(
    side: number,
    values: readonly number[],
    moveCount: number,
    options: PuzzleStateOptions
  ): PuzzleState {
    const cells = createCellStorage(storageKindFor(side, options), values.length);
    let blankIndex = 0;
    values.forEach((value, index) => {
      cells.set(index, value);
      if (value === 0) blankIndex = index;
    });
    return new PuzzleState(
      side,
      cells,
      Math.floor(blankIndex / side),
      blankIndex % side,
      moveCount
    );
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Accessors
  // ═══════════════════════════════════════════════════════════════════════

  get side(): number {
    return this._side;
  }

  /** side², the number of cells including the blank. */
  get cellCount(): number {
    return this._cellCount;
  }

  get blankRow(): number {
    return this._blankRow;
  }

  get blankCol(): number {
    return this._blankCol;
  }

  get blankPosition(): Position {
    return { row: this._blankRow, col: this._blankCol };
  }

  /** Moves applied since this lineage's origin. Not part of identity. */
  get moveCount(): number {
    return this._moveCount;
  }

  set moveCount(value: number) {
    assertMoveCount(value);
    this._moveCount = value;
  }

  get storageKind(): CellStorageKind {
    return this.cells.kind;
  }

  getValue(row: number, col: number): number {
    return this.cells.get(this.indexOf(row, col));
  }

  /**
   * Low-level cell write. Checks coordinate and value ranges only: it does
   * not keep the board a permutation and does not move the cached blank.
   * Call `assertValid()` after a sequence of writes.
   */
  setValue(value: number, row: number, col: number): void {
    const index = this.indexOf(row, col);
    if (!Number.isInteger(value) || value < 0 || value >= this._cellCount) {
      throw new ValueOutOfRangeError(value, this._side, { row, col });
    }
    this.cells.set(index, value);
  }

  /**
   * Check that the cells form a permutation and re-derive the blank
   * coordinates from them.
   */
  assertValid(): void {
    const values = this.toCells();
    assertPermutation(this._side, values);
    const blankIndex = values.indexOf(0);
    this._blankRow = Math.floor(blankIndex / this._side);
    this._blankCol = blankIndex % this._side;
  }

  /** Exchange two cells. Blank tracking is the caller's job. */
  swapCells(row1: number, col1: number, row2: number, col2: number): void {
    const a = this.indexOf(row1, col1);
    const b = this.indexOf(row2, col2);
    const buf = this.cells.get(a);
    this.cells.set(a, this.cells.get(b));
    this.cells.set(b, buf);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Moves
  // ═══════════════════════════════════════════════════════════════════════

  canMove(direction: Direction): boolean {
    return canMoveBlank(this._side, this.blankPosition, direction);
  }

  /** Directions the blank can take, in up/down/left/right order. */
  legalDirections(): Direction[] {
    return legalBlankDirections(this._side, this.blankPosition);
  }

  /**
   * Move the blank in place and count the move.
   * @throws IllegalMoveError when the blank is on that edge; nothing changes.
   */
  applyMove(direction: Direction): void {
    this.assertCanMove(direction);
    const target = blankTarget(this.blankPosition, direction);
    this.swapCells(this._blankRow, this._blankCol, target.row, target.col);
    this._blankRow = target.row;
    this._blankCol = target.col;
    this._moveCount += 1;
  }

  /**
   * The successor reached by moving the blank; the receiver is untouched.
   * @throws IllegalMoveError when the blank is on that edge.
   */
  withMove(direction: Direction): PuzzleState {
    this.assertCanMove(direction);
    const next = PuzzleState.copyOf(this);
    next.applyMove(direction);
    return next;
  }

  moveUp(editInPlace: true): undefined;
  moveUp(editInPlace: false): PuzzleState;
  moveUp(editInPlace: boolean): PuzzleState | undefined;
  moveUp(editInPlace: boolean): PuzzleState | undefined {
    return this.move('up', editInPlace);
  }

  moveDown(editInPlace: true): undefined;
  moveDown(editInPlace: false): PuzzleState;
  moveDown(editInPlace: boolean): PuzzleState | undefined;
  moveDown(editInPlace: boolean): PuzzleState | undefined {
    return this.move('down', editInPlace);
  }

  moveLeft(editInPlace: true): undefined;
  moveLeft(editInPlace: false): PuzzleState;
  moveLeft(editInPlace: boolean): PuzzleState | undefined;
  moveLeft(editInPlace: boolean): PuzzleState | undefined {
    return this.move('left', editInPlace);
  }

  moveRight(editInPlace: true): undefined;
  moveRight(editInPlace: false): PuzzleState;
  moveRight(editInPlace: boolean): PuzzleState | undefined;
  moveRight(editInPlace: boolean): PuzzleState | undefined {
    return this.move('right', editInPlace);
  }

  /** Every successor, in up/down/left/right order. */
  legalMoves(): PuzzleState[] {
    return this.legalDirections().map((direction) => this.withMove(direction));
  }

  private move(direction: Direction, editInPlace: boolean): PuzzleState | undefined {
    if (editInPlace) {
      this.applyMove(direction);
      return undefined;
    }
    return this.withMove(direction);
  }

  private assertCanMove(direction: Direction): void {
    if (!this.canMove(direction)) {
      throw new IllegalMoveError(direction, {
        side: this._side,
        blankRow: this._blankRow,
        blankCol: this._blankCol,
      });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Canonical form
  // ═══════════════════════════════════════════════════════════════════════

  isSolution(): boolean {
    const last = this._cellCount - 1;
    for (let i = 0; i < last; i++) {
      if (this.cells.get(i) !== i + 1) return false;
    }
    return this.cells.get(last) === 0;
  }

  /** Same side and same tile at every cell; move count and storage ignored. */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof PuzzleState) || other._side !== this._side) return false;
    if (this.cells.kind === 'packed' && other.cells.kind === 'packed') {
      return this.cells.packed === other.cells.packed;
    }
    for (let i = 0; i < this._cellCount; i++) {
      if (this.cells.get(i) !== other.cells.get(i)) return false;
    }
    return true;
  }

  /** 16 hex chars derived from side and tiles only. */
  hashCode(): string {
    return hashCells(this);
  }

  fingerprint(): string {
    return fingerprintCells(this);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Encoding
  // ═══════════════════════════════════════════════════════════════════════

  toLine(): string {
    return formatLine(this, this._moveCount);
  }

  toString(): string {
    return formatBoard(this, this._moveCount);
  }

  /** Row-major copy of the cell values. */
  toCells(): number[] {
    const values: number[] = [];
    for (let i = 0; i < this._cellCount; i++) {
      values.push(this.cells.get(i));
    }
    return values;
  }

  toSnapshot(): PuzzleSnapshot {
    return { side: this._side, moveCount: this._moveCount, cells: this.toCells() };
  }

  private indexOf(row: number, col: number): number {
    if (
      !Number.isInteger(row) ||
      !Number.isInteger(col) ||
      row < 0 ||
      row >= this._side ||
      col < 0 ||
      col >= this._side
    ) {
      throw new IndexOutOfRangeError(row, col, this._side);
    }
    return row * this._side + col;
  }
}

/**
 * An explicit `options.storage` is binding. The configured default is only a
 * preference: boards too large to pack fall back to the array layout.
 */
function storageKindFor(side: number, options: PuzzleStateOptions): CellStorageKind {
  if (options.storage !== undefined) {
    return resolveStorageKind(side, options.storage);
  }
  const preferred = resolveConfig().config.storage;
  if (preferred === 'packed' && side > PACKED_MAX_SIDE) {
    return 'array';
  }
  return resolveStorageKind(side, preferred);
}

function assertSide(side: number): void {
  if (!Number.isInteger(side) || side <= 0) {
    throw new InvalidArgumentError('Side size needs to be a positive integer', { side });
  }
}

function assertMoveCount(moveCount: number): void {
  if (!Number.isSafeInteger(moveCount)) {
    throw new InvalidArgumentError('Move count needs to be an integer', { moveCount });
  }
}

function assertPermutation(side: number, cells: readonly number[]): void {
  const cellCount = side * side;
  const seen = new Uint8Array(cellCount);
  cells.forEach((value, index) => {
    if (!Number.isInteger(value) || value < 0 || value >= cellCount) {
      throw new ValueOutOfRangeError(value, side, { index });
    }
    if (seen[value] === 1) {
      throw new InvalidArgumentError(`Value ${value} appears more than once`, { value, index });
    }
    seen[value] = 1;
  });
}
