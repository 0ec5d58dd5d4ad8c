export { BufferSync } from "./buffer-sync";
export { ChannelStore } from "./channel-store";
export { SyncCore } from "./sync-core";
export { SerialWorker, type Job, type StopResult } from "./worker";
export {
  sameType,
  assignable,
  elementwise,
  custom,
  resolveConversion,
} from "./transform";
export { BufferMonitor, NoOpBufferMonitor } from "./monitor";
export { renderChannels } from "./show";
export { getMetrics, register } from "./metrics";
export {
  logger,
  createStructuredLogger,
  StructuredLogger,
  type Namespace,
  type LogLevel,
} from "./logs";
export * from "./errors";
export type * from "./domain";
