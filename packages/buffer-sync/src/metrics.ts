import * as promClient from "prom-client";

/**
 * Registry owned by this package. Kept separate from the prom-client default
 * registry so an embedding application decides what to expose.
 */
export const register = new promClient.Registry();

export const operationCounter = new promClient.Counter({
  name: "buffer_sync_operations_total",
  help: "Buffer operations by channel and operation",
  labelNames: ["channel", "operation"] as const,
  registers: [register],
});

export const jobErrorCounter = new promClient.Counter({
  name: "buffer_sync_job_errors_total",
  help: "Write jobs dropped because their transform failed",
  labelNames: ["channel"] as const,
  registers: [register],
});

export const pendingJobsGauge = new promClient.Gauge({
  name: "buffer_sync_pending_jobs",
  help: "Write jobs queued on buffer workers and not yet finished",
  registers: [register],
});

export const jobLatencyHistogram = new promClient.Histogram({
  name: "buffer_sync_job_latency_seconds",
  help: "Time from put() to the end of its write job",
  labelNames: ["channel"] as const,
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
  registers: [register],
});

export const logCounter = new promClient.Counter({
  name: "log_messages_total",
  help: "Total number of log messages by namespace and level",
  labelNames: ["namespace", "level"] as const,
  registers: [register],
});

export const errorLogCounter = new promClient.Counter({
  name: "log_errors_total",
  help: "Total number of error logs by namespace",
  labelNames: ["namespace", "error_type"] as const,
  registers: [register],
});

export function recordOperation(channel: string, operation: string): void {
  operationCounter.labels(channel, operation).inc();
}

export function recordJob(
  channel: string,
  latencyMs: number,
  failed: boolean,
): void {
  jobLatencyHistogram.labels(channel).observe(latencyMs / 1000);
  if (failed) jobErrorCounter.labels(channel).inc();
}

export async function getMetrics(): Promise<string> {
  return await register.metrics();
}
