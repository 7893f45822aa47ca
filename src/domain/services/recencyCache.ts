/**
 * Bounded Recency Cache
 *
 * Fixed-capacity map from project path to last-access time (Unix seconds).
 * When a new path would push the map over capacity, the least recently
 * used entry is evicted first.
 *
 * Only the last access time is tracked, not an access count. The cache
 * answers one question: which of these paths was touched most recently.
 */

import type { Clock } from "../ports";

/** Wall clock in whole Unix seconds */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Orders entries oldest first. Equal timestamps fall back to path order,
 * so eviction is deterministic.
 */
function compareOldestFirst(
  [pathA, timeA]: [string, number],
  [pathB, timeB]: [string, number]
): number {
  if (timeA !== timeB) return timeA - timeB;
  return pathA < pathB ? -1 : pathA > pathB ? 1 : 0;
}

export class RecencyCache {
  readonly capacity: number;
  protected readonly entries = new Map<string, number>();
  private readonly clock: Clock;

  /**
   * @param capacity - Maximum number of entries (positive integer)
   * @param initial - Entries to start with; trimmed to capacity, oldest dropped first
   * @param clock - Time source, defaults to the wall clock
   */
  constructor(
    capacity: number,
    initial: Iterable<[string, number]> = [],
    clock: Clock = systemClock
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.clock = clock;

    const sorted = [...initial].sort(compareOldestFirst);
    for (const [path, time] of sorted.slice(Math.max(0, sorted.length - capacity))) {
      this.entries.set(path, time);
    }
  }

  /** Number of entries */
  get size(): number {
    return this.entries.size;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  /**
   * Record an access to `path` at the current time.
   *
   * Updating a known path never evicts. Inserting a new path into a full
   * cache evicts exactly one entry: the oldest.
   */
  registerAccess(path: string): void {
    const now = this.clock();

    if (!this.entries.has(path) && this.entries.size >= this.capacity) {
      this.evictOldest();
    }
    this.entries.set(path, now);
  }

  /**
   * Last recorded access time, or 0 for a path never recorded.
   */
  accessTimeOf(path: string): number {
    return this.entries.get(path) ?? 0;
  }

  /**
   * Comparator placing the most recently accessed path first.
   * Paths with equal times compare equal; callers add their own tie-break.
   */
  readonly compareByRecency = (a: string, b: string): number => {
    return this.accessTimeOf(b) - this.accessTimeOf(a);
  };

  /**
   * Entries as a plain object with keys in path order.
   */
  toJSON(): Record<string, number> {
    const keys = [...this.entries.keys()].sort();
    const out: Record<string, number> = {};
    for (const key of keys) {
      out[key] = this.accessTimeOf(key);
    }
    return out;
  }

  private evictOldest(): void {
    let oldest: [string, number] | null = null;
    for (const entry of this.entries) {
      if (oldest === null || compareOldestFirst(entry, oldest) < 0) {
        oldest = entry;
      }
    }
    if (oldest !== null) {
      this.entries.delete(oldest[0]);
    }
  }
}
