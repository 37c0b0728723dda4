import type { CellGrid, PuzzleSnapshot } from '../types/puzzle';
import { MalformedEncodingError } from './errors';

/**
 * Line encoding and board display.
 *
 * Line format: `<moveCount> <v(0,0)> <v(0,1)> … <v(side-1,side-1)>`, single
 * spaces on output, any whitespace on input. The display format is for
 * diagnostics only.
 */

const INTEGER_TOKEN = /^[+-]?\d+$/;

function rowMajorValues(grid: CellGrid): number[] {
  const values: number[] = [];
  for (let row = 0; row < grid.side; row++) {
    for (let col = 0; col < grid.side; col++) {
      values.push(grid.getValue(row, col));
    }
  }
  return values;
}

export function formatLine(grid: CellGrid, moveCount: number): string {
  return [moveCount, ...rowMajorValues(grid)].join(' ');
}

/**
 * Multi-line board dump: a `Level <moveCount>` header, then one line per
 * row with every value followed by a space.
 */
export function formatBoard(grid: CellGrid, moveCount: number): string {
  let out = `Level ${moveCount}\n`;
  for (let row = 0; row < grid.side; row++) {
    for (let col = 0; col < grid.side; col++) {
      out += `${grid.getValue(row, col)} `;
    }
    out += '\n';
  }
  return out;
}

function parseIntegerToken(token: string, index: number): number {
  if (!INTEGER_TOKEN.test(token)) {
    throw new MalformedEncodingError(`Token ${index} is not an integer: "${token}"`, {
      token,
      index,
    });
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedEncodingError(`Token ${index} is out of integer range: "${token}"`, {
      token,
      index,
    });
  }
  return value;
}

/**
 * Parse a line into a validated snapshot. Token count and integer syntax are
 * checked before any cell is assigned; then values must form a permutation
 * of `0..side²-1`.
 */
export function parseLineTokens(text: string): PuzzleSnapshot {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new MalformedEncodingError('Line is empty');
  }

  const tokens = trimmed.split(/\s+/);
  const numbers = tokens.map((token, index) => parseIntegerToken(token, index));

  const cellCount = numbers.length - 1;
  const side = Math.round(Math.sqrt(cellCount));
  if (cellCount === 0 || side * side !== cellCount) {
    throw new MalformedEncodingError("Line doesn't match a square puzzle", {
      cellCount,
    });
  }

  const [moveCount = 0, ...cells] = numbers;
  const seen = new Uint8Array(cellCount);
  cells.forEach((value, i) => {
    if (value < 0 || value >= cellCount) {
      throw new MalformedEncodingError(
        `Value ${value} at (${Math.floor(i / side)}, ${i % side}) is outside 0-${cellCount - 1}`,
        { value, index: i + 1 }
      );
    }
    if (seen[value] === 1) {
      throw new MalformedEncodingError(`Value ${value} appears more than once`, {
        value,
        index: i + 1,
      });
    }
    seen[value] = 1;
  });

  return { side, moveCount, cells };
}
