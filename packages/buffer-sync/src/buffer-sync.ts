import { ChannelStore, assertCapacity } from "./channel-store";
import { SyncCore } from "./sync-core";
import { SerialWorker } from "./worker";
import { resolveConversion, validateDefinitions } from "./transform";
import { BufferMonitor } from "./monitor";
import { renderChannels } from "./show";
import { createStructuredLogger } from "./logs";
import { recordOperation, recordJob } from "./metrics";
import { variables } from "./environment";
import {
  BufferClosedError,
  ConfigurationError,
  InvalidTimestampError,
} from "./errors";
import type {
  BufferSyncOptions,
  ChannelDefinitions,
  ChannelIndex,
  CloseReport,
  CounterType,
  Entry,
  IBufferMonitor,
  InputOf,
  ReadResult,
  SubsetResult,
  Transform,
  TransformArgs,
} from "./domain";

type EntryPicker = (
  store: ChannelStore<unknown>,
  channel: number,
) => Entry<unknown> | undefined;

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Thread-safe multi-channel circular buffer synchronized by timestamp.
 *
 * Each channel keeps the last `queueSize` values put into it. Producers call
 * `put` and return at once; conversion and insertion run on one serial worker
 * per buffer, so inserts land in `put` order across all channels. Consumers
 * read without consuming, per channel or across channels:
 *
 * ```ts
 * const buffer = new BufferSync([
 *   sameType<LaserScan>("laser"),
 *   custom<Frame, Uint8Array>("camera", (frame) => frame.pixels),
 * ]);
 *
 * buffer.put(0, scan, Date.now());
 * const [laser, camera] = buffer.read(Date.now(), 50);
 * ```
 */
export class BufferSync<const D extends ChannelDefinitions> {
  readonly queueSize: number;
  private readonly _definitions: D;
  private readonly _names: readonly string[];
  private readonly _stores: ChannelStore<unknown>[];
  private readonly _core: SyncCore;
  private readonly _worker: SerialWorker;
  private readonly _monitor: IBufferMonitor;
  private readonly _log = createStructuredLogger("buffer");
  private readonly _transformLog = createStructuredLogger("transform");
  private _waiters: Waiter[] = [];
  private _inserted = 0;
  private _closed = false;
  private _closing: Promise<CloseReport> | null = null;

  constructor(definitions: D, options: BufferSyncOptions = {}) {
    validateDefinitions(definitions);

    const queueSize = options.queueSize ?? variables.BUFFER_QUEUE_SIZE;
    assertCapacity(queueSize);

    this.queueSize = queueSize;
    this._definitions = definitions;
    this._names = definitions.map((definition) => definition.name);
    this._stores = definitions.map(() => new ChannelStore<unknown>(queueSize));
    this._core = new SyncCore(
      definitions.length,
      options.now ?? (() => performance.now()),
    );
    this._monitor =
      options.monitor ??
      new BufferMonitor({
        mode: variables.BUFFER_MONITOR_MODE,
        batchSize: variables.MONITOR_BATCH_SIZE,
      });
    this._worker = new SerialWorker({
      onError: (error) =>
        this._log.error("Write job failed outside its transform", error),
    });

    this._log.debug("Buffer created", {
      channels: this._names,
      queueSize,
    });
  }

  get channelCount(): number {
    return this._definitions.length;
  }

  get channelNames(): readonly string[] {
    return this._names;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Write jobs queued and not yet started. */
  get pendingJobs(): number {
    return this._worker.pending;
  }

  get stats(): Record<CounterType, number> {
    return this._monitor.getCounters();
  }

  /**
   * Queue `value` for insertion into `channel` with the caller's `timestamp`.
   *
   * Returns as soon as the job is queued; `drain()` waits for it. Returns
   * false once the buffer is closed. Throws `MissingTransformError` when the
   * channel needs a transform and neither the call nor the channel has one,
   * and `InvalidTimestampError` when `timestamp` is not a safe integer
   * (nanosecond clocks should be scaled down to micro- or milliseconds).
   */
  put<K extends ChannelIndex<D>>(
    channel: K,
    value: InputOf<D[K]>,
    timestamp: number,
    ...args: TransformArgs<D[K]>
  ): boolean {
    const index = this._checkIndex(channel);
    if (!Number.isSafeInteger(timestamp)) {
      throw new InvalidTimestampError(timestamp);
    }

    if (this._closed) {
      this._log.debug("Put rejected, buffer closed", {
        channel: this._names[index],
      });
      return false;
    }

    const extra: readonly unknown[] = args;
    const candidate = extra[0];
    // The static input type was checked on the call; the worker sees unknown
    const convert = resolveConversion(
      this._definitions[index],
      isTransform(candidate) ? candidate : undefined,
    ) as Transform<unknown, unknown>;

    this._monitor.increment("puts");
    recordOperation(this._names[index], "put");

    const enqueuedAt = performance.now();
    return this._worker.spawn(() =>
      this._write(index, convert, value, timestamp, enqueuedAt),
    );
  }

  private async _write(
    index: number,
    convert: Transform<unknown, unknown>,
    value: unknown,
    timestamp: number,
    enqueuedAt: number,
  ): Promise<void> {
    const name = this._names[index];
    let output: unknown;

    try {
      output = await convert(value);
    } catch (error) {
      this._monitor.increment("jobsFailed");
      recordJob(name, performance.now() - enqueuedAt, true);
      this._transformLog.warn(
        "Transform failed, value dropped",
        { channel: name, timestamp },
        error instanceof Error ? error : new Error(String(error)),
      );
      return;
    }

    // Teardown began while the transform ran
    if (this._closed) return;

    const store = this._stores[index];
    this._core.exclusive(() => {
      this._core.markWrite(index);
      if (store.insert(output, timestamp)) {
        this._monitor.increment("evictions");
      }
    });

    this._inserted++;
    this._monitor.increment("inserts");
    recordJob(name, performance.now() - enqueuedAt, false);
    this._wakeWaiters();
  }

  /** Oldest entry of every channel. Channels may be out of phase. */
  readFirst(): ReadResult<D> {
    return this._select(
      this._all(),
      "readFirst",
      (store) => store.front(),
    ) as ReadResult<D>;
  }

  readFirstChannels<const S extends readonly ChannelIndex<D>[]>(
    channels: S,
  ): SubsetResult<D, S> {
    return this._select(
      this._subset(channels),
      "readFirst",
      (store) => store.front(),
    ) as SubsetResult<D, S>;
  }

  /**
   * Newest entry of every channel whose last write is less than `maxDiff`
   * older than the most recent write to any channel. Compares write times,
   * not payload timestamps.
   */
  readLast(maxDiff = Infinity): ReadResult<D> {
    return this._select(
      this._all(),
      "readLast",
      this._pickLast(maxDiff),
    ) as ReadResult<D>;
  }

  readLastChannels<const S extends readonly ChannelIndex<D>[]>(
    channels: S,
    maxDiff = Infinity,
  ): SubsetResult<D, S> {
    return this._select(
      this._subset(channels),
      "readLast",
      this._pickLast(maxDiff),
    ) as SubsetResult<D, S>;
  }

  /**
   * Entry of every channel whose timestamp is nearest to `timestamp`.
   *
   * The search uses the absolute distance, the tolerance check the signed
   * one: an entry is kept when `timestamp - entry.timestamp <= maxDiff`, so
   * entries newer than the query always pass it.
   */
  read(timestamp: number, maxDiff = Infinity): ReadResult<D> {
    return this._select(
      this._all(),
      "read",
      this._pickNearest(timestamp, maxDiff),
    ) as ReadResult<D>;
  }

  readChannels<const S extends readonly ChannelIndex<D>[]>(
    channels: S,
    timestamp: number,
    maxDiff = Infinity,
  ): SubsetResult<D, S> {
    return this._select(
      this._subset(channels),
      "read",
      this._pickNearest(timestamp, maxDiff),
    ) as SubsetResult<D, S>;
  }

  private _pickLast(maxDiff: number): EntryPicker {
    let globalMax: number | null = null;
    return (store, channel) => {
      // Taken once per read, inside the same shared section as the stores
      const latest = (globalMax ??= this._core.globalLastWrite);
      const entry = store.back();
      if (entry && latest - this._core.lastWrite(channel) < maxDiff) {
        return entry;
      }
      return undefined;
    };
  }

  private _pickNearest(timestamp: number, maxDiff: number): EntryPicker {
    return (store) => {
      const entry = store.nearest(timestamp);
      if (entry && timestamp - entry.timestamp <= maxDiff) return entry;
      return undefined;
    };
  }

  private _select(
    channels: readonly number[],
    operation: string,
    pick: EntryPicker,
  ): unknown[] {
    this._monitor.increment("reads");
    for (const channel of channels) {
      recordOperation(this._names[channel], operation);
    }

    if (!this._core.hasAnyData) {
      this._monitor.increment("fastPathReads");
      this._monitor.increment("noValue", channels.length);
      return channels.map(() => undefined);
    }

    return this._core.shared(() => {
      const values = channels.map((channel) => {
        const entry = pick(this._stores[channel], channel);
        if (!entry) this._monitor.increment("noValue");
        return entry?.value;
      });

      if (this._stores.every((store) => store.isEmpty)) {
        this._core.markEmpty();
      }
      return values;
    });
  }

  /**
   * Resolves once some channel holds data: immediately if it already does.
   * Rejects with `BufferClosedError` when the buffer closes first.
   */
  whenData(): Promise<void> {
    if (this._closed) return Promise.reject(new BufferClosedError());
    if (this._core.hasAnyData) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      this._waiters.push({ resolve, reject });
    });
  }

  private _wakeWaiters(): void {
    if (this._waiters.length === 0) return;
    const waiters = this._waiters;
    this._waiters = [];
    waiters.forEach((waiter) => waiter.resolve());
  }

  /** Resolves when every queued write job has finished. */
  drain(): Promise<void> {
    return this._worker.drain();
  }

  /**
   * Stop accepting writes, drop queued jobs that have not started, wait for
   * the running one (its insert is skipped) and release channel storage.
   * Safe to call more than once.
   */
  close(): Promise<CloseReport> {
    if (this._closing) return this._closing;
    this._closed = true;

    this._closing = (async () => {
      const { discarded } = await this._worker.stop();
      this._monitor.increment("jobsDiscarded", discarded);

      this._core.exclusive(() => {
        this._stores.forEach((store) => store.clear());
        this._core.reset();
      });

      const waiters = this._waiters;
      this._waiters = [];
      waiters.forEach((waiter) => waiter.reject(new BufferClosedError()));

      const report: CloseReport = { discarded, inserted: this._inserted };
      this._monitor.flush();
      this._log.info("Buffer closed", { ...report });
      return report;
    })();

    return this._closing;
  }

  /** Human-readable dump of every slot of every channel. */
  show(): string {
    const table = this._core.shared(() =>
      renderChannels(this._names, this._stores, this.queueSize),
    );
    this._log.debug(`Buffer contents\n${table}`);
    return table;
  }

  private _all(): number[] {
    return this._stores.map((_store, index) => index);
  }

  private _subset(channels: readonly number[]): number[] {
    return channels.map((channel) => this._checkIndex(channel));
  }

  private _checkIndex(channel: number): number {
    if (
      !Number.isInteger(channel) ||
      channel < 0 ||
      channel >= this._stores.length
    ) {
      throw new ConfigurationError(
        `Unknown channel index ${channel}, buffer has ${this._stores.length} channels`,
      );
    }
    return channel;
  }
}

function isTransform(value: unknown): value is Transform<never, unknown> {
  return typeof value === "function";
}
