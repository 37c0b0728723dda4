import type { CellGrid } from '../types/puzzle';

/**
 * Canonical fingerprint of a board - a deterministic, human-readable string
 * over the side and the row-major cell values. Move count is not part of it,
 * so boards reached along different paths fingerprint identically.
 *
 * Format: `<side>:<v(0,0)>,<v(0,1)>,…,<v(side-1,side-1)>`
 */
export function fingerprintCells(grid: CellGrid): string {
  const values: number[] = [];
  for (let row = 0; row < grid.side; row++) {
    for (let col = 0; col < grid.side; col++) {
      values.push(grid.getValue(row, col));
    }
  }
  return `${grid.side}:${values.join(',')}`;
}

/**
 * Hash of the board fingerprint, 16 hex chars. Stable across processes, so
 * it can key persisted transposition tables.
 */
export function hashCells(grid: CellGrid): string {
  return simpleHash(fingerprintCells(grid));
}

/**
 * 64-bit string hash over two 32-bit lanes, rendered as 16 hex chars. Used
 * to bucket board fingerprints in StateSet; not a cryptographic hash, so
 * equality is always confirmed with `equals()`.
 */
export function simpleHash(str: string): string {
  let h1 = 0xdeadbeef | 0;
  let h2 = 0x41c6ce57 | 0;

  for (let i = 0; i < str.length; i += 1) {
    const ch = str.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761) | 0;
    h2 = Math.imul(h2 ^ ch, 1597334677) | 0;
  }

  h1 = (Math.imul(h1 ^ (h1 >>> 16), 2246822507) ^ Math.imul(h2 ^ (h2 >>> 13), 3266489909)) | 0;
  h2 = (Math.imul(h2 ^ (h2 >>> 16), 2246822507) ^ Math.imul(h1 ^ (h1 >>> 13), 3266489909)) | 0;

  const hi = h2 >>> 0;
  const lo = h1 >>> 0;
  return hi.toString(16).padStart(8, '0') + lo.toString(16).padStart(8, '0');
}
