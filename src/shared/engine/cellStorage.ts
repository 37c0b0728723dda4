import type { CellStorageKind, CellStoragePreference } from '../types/puzzle';
import { InvalidArgumentError } from './errors';

/**
 * Cell storage variants for PuzzleState.
 *
 * Cells are addressed by row-major index. Neither variant checks ranges;
 * PuzzleState validates coordinates and values before touching storage.
 */

/** Largest side the packed layout can hold (16 cells × 4 bits = 64 bits). */
export const PACKED_MAX_SIDE = 4;

const BITS_PER_CELL = 4n;
const CELL_MASK = 0xfn;

/** Dense row-major layout; works for any side. */
export class ArrayCellStorage {
  readonly kind = 'array' as const;
  private readonly cells: Uint32Array;

  constructor(cellCount: number, source?: Uint32Array) {
    this.cells = source ? Uint32Array.from(source) : new Uint32Array(cellCount);
  }

  get(index: number): number {
    return this.cells[index] ?? 0;
  }

  set(index: number, value: number): void {
    this.cells[index] = value;
  }

  clone(): ArrayCellStorage {
    return new ArrayCellStorage(this.cells.length, this.cells);
  }
}

/**
 * All cells packed into a single bigint, 4 bits per cell, cell 0 in the
 * lowest nibble.
 */
export class PackedCellStorage {
  readonly kind = 'packed' as const;
  private bits: bigint;

  constructor(bits: bigint = 0n) {
    this.bits = bits;
  }

  get(index: number): number {
    return Number((this.bits >> (BigInt(index) * BITS_PER_CELL)) & CELL_MASK);
  }

  set(index: number, value: number): void {
    const shift = BigInt(index) * BITS_PER_CELL;
    this.bits = (this.bits & ~(CELL_MASK << shift)) | (BigInt(value) << shift);
  }

  clone(): PackedCellStorage {
    return new PackedCellStorage(this.bits);
  }

  /** Raw packed word, usable as a compact key for boards of the same side. */
  get packed(): bigint {
    return this.bits;
  }
}

export type CellStorage = ArrayCellStorage | PackedCellStorage;

/**
 * Pick the concrete layout for a board. `auto` uses the packed word when the
 * board fits in it.
 */
export function resolveStorageKind(
  side: number,
  preference: CellStoragePreference
): CellStorageKind {
  switch (preference) {
    case 'array':
      return 'array';
    case 'packed':
      if (side > PACKED_MAX_SIDE) {
        throw new InvalidArgumentError(
          `Packed storage supports sides up to ${PACKED_MAX_SIDE}, got ${side}`,
          { side, storage: preference }
        );
      }
      return 'packed';
    case 'auto':
      return side <= PACKED_MAX_SIDE ? 'packed' : 'array';
  }
}

export function createCellStorage(kind: CellStorageKind, cellCount: number): CellStorage {
  return kind === 'packed' ? new PackedCellStorage() : new ArrayCellStorage(cellCount);
}
