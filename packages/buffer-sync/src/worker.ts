import Queue from "queue";
import { setImmediate as nextTurn } from "node:timers/promises";
import { createStructuredLogger } from "./logs";
import { pendingJobsGauge } from "./metrics";

export type Job = () => void | Promise<void>;

export interface SerialWorkerConfig {
  /** Called with the error of a failed job; the worker keeps running. */
  onError?: (error: Error) => void;
  /** Jobs run back to back before yielding to the event loop. */
  batchSize?: number;
}

export interface StopResult {
  discarded: number;
}

const log = createStructuredLogger("worker");

/**
 * Single background queue: jobs run one at a time in submission order.
 *
 * Jobs are grouped into batches of at most `batchSize`, and each batch is one
 * entry of the operation queue. A batch starts on a later macrotask than the
 * one that filled it, so `spawn` never runs a job on the caller's turn and
 * timers and I/O get a turn between batches.
 */
export class SerialWorker {
  // serialize batches and autostart them
  private readonly _operationQueue = new Queue({
    concurrency: 1,
    autostart: true,
  });
  private readonly _onError: (error: Error) => void;
  private readonly _batchSize: number;
  private _open: Job[] | null = null;
  private _pending = 0;
  private _activeBatches = 0;
  private _accepting = true;

  constructor({ onError, batchSize = 64 }: SerialWorkerConfig = {}) {
    this._onError =
      onError ??
      ((error) => log.warn("Job failed", { error: error.message }, error));
    this._batchSize = batchSize;
  }

  /** Queue a job. Returns false once the worker is stopped. */
  spawn(job: Job): boolean {
    if (!this._accepting) return false;

    let batch = this._open;
    if (!batch || batch.length >= this._batchSize) {
      const fresh: Job[] = [];
      this._open = batch = fresh;
      this._activeBatches++;
      this._operationQueue.push(() => this._runBatch(fresh));
    }

    batch.push(job);
    this._pending++;
    pendingJobsGauge.inc();
    return true;
  }

  private async _runBatch(batch: Job[]): Promise<void> {
    try {
      await nextTurn();
      if (this._open === batch) this._open = null;

      for (let i = 0; i < batch.length && this._accepting; i++) {
        this._pending--;
        pendingJobsGauge.dec();
        try {
          await batch[i]();
        } catch (error) {
          this._onError(
            error instanceof Error ? error : new Error(String(error)),
          );
        }
      }
    } finally {
      this._activeBatches--;
    }
  }

  /** Resolves once no job is queued or running. */
  async drain(): Promise<void> {
    while (this._activeBatches > 0) {
      await new Promise<void>((resolve) => {
        const onEnd = () => {
          this._operationQueue.removeEventListener("end", onEnd);
          resolve();
        };
        this._operationQueue.addEventListener("end", onEnd);
      });
    }
  }

  /**
   * Stop accepting jobs, drop the ones that have not started and wait for the
   * one in progress.
   */
  async stop(): Promise<StopResult> {
    this._accepting = false;
    this._open = null;

    const discarded = this._pending;
    this._pending = 0;
    if (discarded > 0) {
      pendingJobsGauge.dec(discarded);
      log.debug("Discarded queued jobs", { discarded });
    }

    await this.drain();
    return { discarded };
  }

  /** Jobs queued and not yet started. */
  get pending(): number {
    return this._pending;
  }

  get accepting(): boolean {
    return this._accepting;
  }

  get idle(): boolean {
    return this._activeBatches === 0;
  }
}
