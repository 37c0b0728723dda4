import { PuzzleState } from './PuzzleState';

/**
 * Set of board configurations for visited-set and transposition-table use.
 *
 * Entries are bucketed by `hashCode()` and resolved with `equals()`, so two
 * states with the same tiles and different move counts are one entry. The
 * set owns its entries: it copies on the way in and on the way out, so
 * mutating a state passed to or returned from it does not affect the set.
 */
export class StateSet {
  private readonly buckets = new Map<string, PuzzleState[]>();
  private count = 0;

  constructor(states: Iterable<PuzzleState> = []) {
    for (const state of states) {
      this.add(state);
    }
  }

  /**
   * Add the configuration of `state`.
   * @returns true when the configuration was not present yet.
   */
  add(state: PuzzleState): boolean {
    const key = state.hashCode();
    const bucket = this.buckets.get(key);
    if (bucket === undefined) {
      this.buckets.set(key, [PuzzleState.copyOf(state)]);
    } else if (bucket.some((entry) => entry.equals(state))) {
      return false;
    } else {
      bucket.push(PuzzleState.copyOf(state));
    }
    this.count++;
    return true;
  }

  has(state: PuzzleState): boolean {
    return this.find(state) !== undefined;
  }

  /**
   * Copy of the stored entry with the same configuration, carrying the move
   * count it was first added with.
   */
  get(state: PuzzleState): PuzzleState | undefined {
    const entry = this.find(state);
    return entry === undefined ? undefined : PuzzleState.copyOf(entry);
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *values(): IterableIterator<PuzzleState> {
    for (const bucket of this.buckets.values()) {
      for (const entry of bucket) {
        yield PuzzleState.copyOf(entry);
      }
    }
  }

  private find(state: PuzzleState): PuzzleState | undefined {
    return this.buckets.get(state.hashCode())?.find((entry) => entry.equals(state));
  }
}
