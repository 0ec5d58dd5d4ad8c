import { ConfigurationError } from "./errors";
import type { Entry } from "./domain";

export function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new ConfigurationError(
      `Queue size must be a positive integer, got ${capacity}`,
    );
  }
}

/**
 * Fixed-capacity ring of entries, oldest first. Inserting into a full store
 * evicts the oldest entry (insertion order, not timestamp order).
 *
 * Holds no lock of its own: callers serialize access.
 */
export class ChannelStore<O> {
  private _slots: (Entry<O> | undefined)[];
  private _head = 0; // index of the oldest entry
  private _count = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    assertCapacity(capacity);
    this.capacity = capacity;
    this._slots = new Array<Entry<O> | undefined>(capacity);
  }

  /**
   * Append an entry, evicting the oldest one first when full.
   * Returns the evicted entry, if any.
   */
  insert(value: O, timestamp: number): Entry<O> | undefined {
    let evicted: Entry<O> | undefined;

    if (this._count === this.capacity) {
      evicted = this._slots[this._head];
      this._slots[this._head] = undefined;
      this._head = (this._head + 1) % this.capacity;
      this._count--;
    }

    this._slots[(this._head + this._count) % this.capacity] = {
      value,
      timestamp,
    };
    this._count++;

    return evicted;
  }

  /** Oldest entry */
  front(): Entry<O> | undefined {
    return this._count === 0 ? undefined : this._slots[this._head];
  }

  /** Newest entry */
  back(): Entry<O> | undefined {
    if (this._count === 0) return undefined;
    return this._slots[(this._head + this._count - 1) % this.capacity];
  }

  /** Entry at position `index`, 0 being the oldest. */
  at(index: number): Entry<O> | undefined {
    if (index < 0 || index >= this._count) return undefined;
    return this._slots[(this._head + index) % this.capacity];
  }

  *entries(): Generator<Entry<O>, void, unknown> {
    for (let i = 0; i < this._count; i++) {
      const entry = this._slots[(this._head + i) % this.capacity];
      if (entry) yield entry;
    }
  }

  /**
   * Entry whose timestamp is nearest to `timestamp`. Entries are scanned
   * oldest first and an earlier entry wins a tie; payload timestamps may be
   * out of order, so the whole store is scanned.
   */
  nearest(timestamp: number): Entry<O> | undefined {
    let best: Entry<O> | undefined;
    let bestDiff = Infinity;

    for (const entry of this.entries()) {
      const diff = Math.abs(entry.timestamp - timestamp);
      if (best === undefined || diff < bestDiff) {
        best = entry;
        bestDiff = diff;
      }
    }

    return best;
  }

  get size(): number {
    return this._count;
  }

  get isEmpty(): boolean {
    return this._count === 0;
  }

  get isFull(): boolean {
    return this._count === this.capacity;
  }

  clear(): void {
    this._slots = new Array<Entry<O> | undefined>(this.capacity);
    this._head = 0;
    this._count = 0;
  }
}
