import { setTimeout as sleep } from "node:timers/promises";
import {
  BufferSync,
  createStructuredLogger,
  custom,
  elementwise,
  getMetrics,
  sameType,
} from "../src";

interface LaserScan {
  ranges: number[];
}

const log = createStructuredLogger("buffer");

const buffer = new BufferSync(
  [
    sameType<number>("odometry"),
    custom<LaserScan, number>("nearest-obstacle", (scan) =>
      Math.min(...scan.ranges),
    ),
    elementwise("imu", (samples: Iterable<number>) =>
      Float64Array.from(samples),
    ),
  ],
  { queueSize: 16 },
);

async function produce(
  label: string,
  periodMs: number,
  count: number,
  emit: (i: number, timestamp: number) => void,
): Promise<void> {
  for (let i = 0; i < count; i++) {
    emit(i, Date.now());
    await sleep(periodMs);
  }
  log.info("Producer finished", { producer: label, count });
}

async function consume(until: Promise<unknown>): Promise<void> {
  await buffer.whenData();

  let done = false;
  const stop = () => {
    done = true;
  };
  void until.then(stop, stop);

  while (!done) {
    const [odometry, obstacle, imu] = buffer.read(Date.now(), 25);
    log.info("Synchronized sample", {
      odometry,
      obstacle,
      imu: imu ? Array.from(imu) : undefined,
    });
    await sleep(40);
  }
}

async function main(): Promise<void> {
  const producers = Promise.all([
    produce("odometry", 10, 50, (i, t) => buffer.put(0, i * 0.1, t)),
    produce("laser", 33, 15, (i, t) =>
      buffer.put(1, { ranges: [4 - i * 0.1, 2.5, 6] }, t),
    ),
    produce("imu", 5, 100, (i, t) => buffer.put(2, [i, i + 1, i + 2], t)),
  ]);

  await Promise.all([producers, consume(producers)]);
  await buffer.drain();

  if (log.debugEnabled) buffer.show();
  log.info("Buffer stats", { ...buffer.stats });

  const report = await buffer.close();
  log.info("Done", { ...report });
  process.stdout.write(await getMetrics());
}

main().catch((error: unknown) => {
  log.error(
    "Example failed",
    error instanceof Error ? error : new Error(String(error)),
  );
  process.exitCode = 1;
});
