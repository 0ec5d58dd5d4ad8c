import { LockOrderError } from "./errors";

/**
 * Read/write lock over all channel stores of one buffer, plus the state that
 * readers and the write worker coordinate through.
 *
 * Sections run synchronously, so two sections never interleave on the event
 * loop. The lock still tracks them: shared sections nest, but an exclusive
 * section may not open while any section is open (a callback re-entering the
 * buffer from inside a read).
 *
 * One lock for all channels is what lets `readLast` compare write times
 * across channels consistently.
 */
export class SyncCore {
  private _readers = 0;
  private _writing = false;
  private readonly _lastWrite: number[];
  private _hasAnyData = false;

  constructor(
    channelCount: number,
    private readonly _now: () => number,
  ) {
    this._lastWrite = new Array<number>(channelCount).fill(0);
  }

  shared<T>(section: () => T): T {
    if (this._writing) {
      throw new LockOrderError(
        "Shared section requested inside an exclusive section",
      );
    }
    this._readers++;
    try {
      return section();
    } finally {
      this._readers--;
    }
  }

  exclusive<T>(section: () => T): T {
    if (this._writing) {
      throw new LockOrderError(
        "Exclusive section requested inside another exclusive section",
      );
    }
    if (this._readers > 0) {
      throw new LockOrderError(
        "Exclusive section requested while a shared section is open",
      );
    }
    this._writing = true;
    try {
      return section();
    } finally {
      this._writing = false;
    }
  }

  /** Stamp a channel with the current clock reading. Exclusive sections only. */
  markWrite(channel: number): void {
    this._lastWrite[channel] = this._now();
    this._hasAnyData = true;
  }

  lastWrite(channel: number): number {
    return this._lastWrite[channel];
  }

  /** Latest write time over every channel. */
  get globalLastWrite(): number {
    return Math.max(...this._lastWrite);
  }

  /**
   * Hint that some channel holds data. May lag behind the stores: a stale
   * `true` only costs a lock, and it only turns `false` once every store was
   * seen empty.
   */
  get hasAnyData(): boolean {
    return this._hasAnyData;
  }

  markEmpty(): void {
    this._hasAnyData = false;
  }

  reset(): void {
    this._lastWrite.fill(0);
    this._hasAnyData = false;
  }

  get locked(): "shared" | "exclusive" | false {
    if (this._writing) return "exclusive";
    return this._readers > 0 ? "shared" : false;
  }
}
