/** Discrete simulation step index. */
export type Tick = number;

export interface HistoryEntry<T> {
  tick: Tick;
  data: T;
}

export type HistoryRead<T> = { found: true; data: T } | { found: false; data: undefined };

export interface HistoryFind {
  found: boolean;
  /** Exact index on a hit, insertion index on a miss. Invalidated by the next mutation. */
  index: number;
}

/** Entries past `capacity` tolerated before a prune, at minimum. */
const MIN_CUT_SLACK = 10;

/**
 * Tick-ordered storage with binary-search lookup.
 *
 * With a positive capacity the history is soft-bounded: writes are allowed to
 * grow it to `cutThreshold`, at which point the oldest entries are dropped in
 * one go to get back down to exactly `capacity`. Pruning in batches keeps the
 * array shift off the per-write path.
 */
export class History<T> implements Iterable<HistoryEntry<T>> {
  private entries: HistoryEntry<T>[] = [];
  private readonly maxCount: number;
  private readonly limitToCut: number;

  /** @param capacity Entries kept reliably, rounded down. Below 1 means unbounded. */
  constructor(capacity = 0) {
    const maxCount = Math.floor(capacity);
    if (maxCount > 0) {
      this.maxCount = maxCount;
      this.limitToCut = Math.max(
        this.maxCount + MIN_CUT_SLACK,
        this.maxCount + Math.floor(this.maxCount / 2),
      );
    } else {
      this.maxCount = 0;
      this.limitToCut = Number.POSITIVE_INFINITY;
    }
  }

  get count(): number {
    return this.entries.length;
  }

  /** 0 when unbounded. */
  get capacity(): number {
    return this.maxCount;
  }

  /** Size at which the front gets pruned back to `capacity`. */
  get cutThreshold(): number {
    return this.limitToCut;
  }

  /** Tick of the newest entry, 0 when empty. */
  get mostRecentTick(): Tick {
    const last = this.entries[this.entries.length - 1];
    return last ? last.tick : 0;
  }

  /** Tick of the oldest entry still held, 0 when empty. */
  get oldestTick(): Tick {
    const first = this.entries[0];
    return first ? first.tick : 0;
  }

  getEntryTick(index: number): Tick {
    return this.entryAt(index).tick;
  }

  at(index: number): T {
    return this.entryAt(index).data;
  }

  setAt(index: number, data: T): void {
    this.entryAt(index).data = data;
  }

  write(tick: Tick, data: T): void {
    const { found, index } = this.find(tick);
    if (found) {
      this.entryAt(index).data = data;
      return;
    }

    this.entries.splice(index, 0, { tick, data });

    if (this.entries.length >= this.limitToCut) {
      this.entries.splice(0, this.entries.length - this.maxCount);
    }
  }

  read(tick: Tick): HistoryRead<T> {
    const { found, index } = this.find(tick);
    const entry = found ? this.entries[index] : undefined;
    if (!entry) return { found: false, data: undefined };
    return { found: true, data: entry.data };
  }

  find(tick: Tick): HistoryFind {
    let min = 0;
    let max = this.entries.length - 1;

    while (min <= max) {
      const mid = (min + max) >>> 1;
      const midTick = this.entryAt(mid).tick;
      if (tick === midTick) return { found: true, index: mid };
      if (tick < midTick) {
        max = mid - 1;
      } else {
        min = mid + 1;
      }
    }

    return { found: false, index: min };
  }

  /** Drop everything older than `tick` (and `tick` itself when inclusive). */
  clearPast(tick: Tick, inclusive = false): void {
    const { found, index } = this.find(tick);
    const end = found && inclusive ? index + 1 : index;
    this.entries.splice(0, end);
  }

  /** Drop everything newer than `tick` (and `tick` itself when inclusive). */
  clearFuture(tick: Tick, inclusive = false): void {
    const { found, index } = this.find(tick);
    const start = found && !inclusive ? index + 1 : index;
    this.entries.splice(start);
  }

  clear(): void {
    this.entries = [];
  }

  *[Symbol.iterator](): Iterator<HistoryEntry<T>> {
    for (const { tick, data } of this.entries) {
      yield { tick, data };
    }
  }

  private entryAt(index: number): HistoryEntry<T> {
    const entry = this.entries[index];
    if (!entry) {
      throw new RangeError(`History index ${index} out of range (count ${this.entries.length})`);
    }
    return entry;
  }
}
