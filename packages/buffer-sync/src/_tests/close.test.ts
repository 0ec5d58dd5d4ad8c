import { describe, test, expect } from "vitest";
import { BufferSync } from "../buffer-sync";
import { sameType, custom } from "../transform";
import { BufferClosedError } from "../errors";

function twoChannels() {
  return new BufferSync([sameType<number>("left"), sameType<number>("right")], {
    queueSize: 4,
  });
}

describe("BufferSync.close", () => {
  test("discards every job that has not started", async () => {
    const buffer = twoChannels();
    for (let i = 0; i < 1000; i++) buffer.put(i % 2 === 0 ? 0 : 1, i, i);

    const report = await buffer.close();

    expect(report).toEqual({ discarded: 1000, inserted: 0 });
    expect(buffer.readFirst()).toEqual([undefined, undefined]);
    expect(buffer.stats.jobsDiscarded).toBe(1000);
  });

  test("reports earlier inserts and releases their storage", async () => {
    const buffer = twoChannels();
    for (let i = 0; i < 5; i++) buffer.put(0, i, i);
    await buffer.drain();
    for (let i = 0; i < 10; i++) buffer.put(1, i, i);

    await expect(buffer.close()).resolves.toEqual({
      discarded: 10,
      inserted: 5,
    });
    expect(buffer.readLast()).toEqual([undefined, undefined]);
    expect(buffer.read(3)).toEqual([undefined, undefined]);
  });

  test("skips the insert of the job running when it closes", async () => {
    let started = () => {};
    let release = () => {};
    const running = new Promise<void>((resolve) => {
      started = () => resolve();
    });
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const buffer = new BufferSync([
      custom<number, number>("gated", async (n) => {
        started();
        await gate;
        return n;
      }),
    ]);
    buffer.put(0, 1, 1);
    buffer.put(0, 2, 2);
    buffer.put(0, 3, 3);
    await running;

    const closing = buffer.close();
    release();

    await expect(closing).resolves.toEqual({ discarded: 2, inserted: 0 });
    expect(buffer.readFirst()).toEqual([undefined]);
  });

  test("rejects puts afterwards", async () => {
    const buffer = twoChannels();
    await buffer.close();

    expect(buffer.closed).toBe(true);
    expect(buffer.put(0, 1, 1)).toBe(false);
    expect(buffer.pendingJobs).toBe(0);
  });

  test("rejects pending and later whenData calls", async () => {
    const buffer = twoChannels();
    const waiting = expect(buffer.whenData()).rejects.toBeInstanceOf(
      BufferClosedError,
    );

    await buffer.close();

    await waiting;
    await expect(buffer.whenData()).rejects.toBeInstanceOf(BufferClosedError);
  });

  test("is idempotent", async () => {
    const buffer = twoChannels();
    buffer.put(0, 1, 1);

    const first = buffer.close();
    const second = buffer.close();

    expect(second).toBe(first);
    await expect(second).resolves.toEqual({ discarded: 1, inserted: 0 });
  });
});
