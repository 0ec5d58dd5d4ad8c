import type { CounterType, IBufferMonitor } from "./domain";

export interface BufferMonitorConfig {
  mode?: "disabled" | "counters";
  batchSize?: number;
}

const counterTypes: readonly CounterType[] = [
  "puts",
  "inserts",
  "evictions",
  "jobsFailed",
  "jobsDiscarded",
  "reads",
  "fastPathReads",
  "noValue",
];

function zeroCounters(): Record<CounterType, number> {
  return {
    puts: 0,
    inserts: 0,
    evictions: 0,
    jobsFailed: 0,
    jobsDiscarded: 0,
    reads: 0,
    fastPathReads: 0,
    noValue: 0,
  };
}

/**
 * Counter monitor with batched updates: increments land in a pending table
 * and are folded into the totals every `batchSize` increments or on the next
 * macrotask, whichever comes first.
 */
export class BufferMonitor implements IBufferMonitor {
  readonly mode: "disabled" | "counters";
  private readonly _batchSize: number;
  private _batchCount = 0;
  private _flushTimer: NodeJS.Timeout | null = null;
  private _counters = zeroCounters();
  private _pending = zeroCounters();

  constructor({ mode = "counters", batchSize = 100 }: BufferMonitorConfig = {}) {
    this.mode = mode;
    this._batchSize = batchSize;
  }

  increment(counter: CounterType, amount = 1): void {
    if (this.mode === "disabled") return;

    this._pending[counter] += amount;
    this._batchCount++;

    if (this._batchCount >= this._batchSize) {
      this.flush();
    } else if (!this._flushTimer) {
      this._flushTimer = setTimeout(() => this.flush(), 0);
      this._flushTimer.unref();
    }
  }

  getCounters(): Record<CounterType, number> {
    this.flush();
    return { ...this._counters };
  }

  flush(): void {
    if (this._batchCount === 0) return;

    for (const counter of counterTypes) {
      this._counters[counter] += this._pending[counter];
      this._pending[counter] = 0;
    }

    this._batchCount = 0;
    this._clearFlushTimer();
  }

  reset(): void {
    this._counters = zeroCounters();
    this._pending = zeroCounters();
    this._batchCount = 0;
    this._clearFlushTimer();
  }

  private _clearFlushTimer(): void {
    if (this._flushTimer) {
      clearTimeout(this._flushTimer);
      this._flushTimer = null;
    }
  }
}

export class NoOpBufferMonitor implements IBufferMonitor {
  readonly mode = "disabled" as const;

  increment(_counter: CounterType, _amount = 1): void {}

  getCounters(): Record<CounterType, number> {
    return zeroCounters();
  }

  flush(): void {}

  reset(): void {}
}
