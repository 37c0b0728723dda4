/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Serialization Utilities for Puzzle States
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Batch line encoding (one state per line) for puzzle databases and worker
 * queues, plus a JSON contract validated with zod. Every decoding failure
 * surfaces as MalformedEncodingError; an unusable storage option is the
 * caller's error and surfaces unchanged as InvalidArgumentError.
 */

import { z } from 'zod';
import type { PuzzleSnapshot, PuzzleStateOptions } from '../../types/puzzle';
import { logger } from '../../utils/logger';
import { MalformedEncodingError, isMalformedEncoding, toMalformedEncoding } from '../errors';
import { resolveStorageKind } from '../cellStorage';
import { PuzzleState } from '../PuzzleState';

// ═══════════════════════════════════════════════════════════════════════════
// JSON contract
// ═══════════════════════════════════════════════════════════════════════════

export const PuzzleSnapshotSchema = z.object({
  side: z.number().int().min(1),
  moveCount: z.number().int(),
  cells: z.array(z.number().int()),
});

export type SerializedPuzzleState = z.infer<typeof PuzzleSnapshotSchema>;

export function serializePuzzleState(state: PuzzleState): SerializedPuzzleState {
  return state.toSnapshot();
}

/**
 * Validate an untrusted JSON value and build the state it describes.
 */
export function deserializePuzzleState(
  data: unknown,
  options: PuzzleStateOptions = {}
): PuzzleState {
  const result = PuzzleSnapshotSchema.safeParse(data);
  if (!result.success) {
    throw new MalformedEncodingError('Serialized puzzle state failed validation', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const snapshot: PuzzleSnapshot = result.data;
  if (options.storage !== undefined) {
    resolveStorageKind(snapshot.side, options.storage);
  }
  try {
    return PuzzleState.fromCells(snapshot.side, snapshot.cells, snapshot.moveCount, options);
  } catch (err) {
    throw toMalformedEncoding(err, { side: snapshot.side });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Line batches
// ═══════════════════════════════════════════════════════════════════════════

/** One `toLine()` per state, newline separated, no trailing newline. */
export function encodeLines(states: Iterable<PuzzleState>): string {
  const lines: string[] = [];
  for (const state of states) {
    lines.push(state.toLine());
  }
  return lines.join('\n');
}

/**
 * Parse one state per line. Blank lines are skipped; the first bad line
 * aborts the batch with its 1-based line number in the error context.
 */
export function decodeLines(text: string, options: PuzzleStateOptions = {}): PuzzleState[] {
  const states: PuzzleState[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    const lineNumber = index + 1;
    if (line.trim().length === 0) {
      logger.debug('Skipping blank line in puzzle batch', { lineNumber });
      return;
    }
    try {
      states.push(PuzzleState.parseLine(line, options));
    } catch (err) {
      // Storage-option errors are not about the text and pass through.
      if (!isMalformedEncoding(err)) throw err;
      throw toMalformedEncoding(err, { line: lineNumber });
    }
  });
  logger.debug('Decoded puzzle batch', { count: states.length });
  return states;
}
