export type BufferSyncErrorCode =
  | "E_CONFIGURATION"
  | "E_MISSING_TRANSFORM"
  | "E_BUFFER_CLOSED"
  | "E_LOCK_ORDER"
  | "E_INVALID_TIMESTAMP";

export class BufferSyncError extends Error {
  constructor(
    readonly code: BufferSyncErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Channel list, capacity or channel index is invalid. */
export class ConfigurationError extends BufferSyncError {
  constructor(message: string) {
    super("E_CONFIGURATION", message);
  }
}

/**
 * The channel stores a different representation than it accepts and the
 * caller gave no way to convert between them.
 */
export class MissingTransformError extends BufferSyncError {
  constructor(readonly channel: string) {
    super(
      "E_MISSING_TRANSFORM",
      `Channel "${channel}" needs a transform to convert its input into its output type`,
    );
  }
}

export class BufferClosedError extends BufferSyncError {
  constructor() {
    super("E_BUFFER_CLOSED", "Buffer is closed");
  }
}

/** A lock section was opened where it would conflict with an open one. */
export class LockOrderError extends BufferSyncError {
  constructor(message: string) {
    super("E_LOCK_ORDER", message);
  }
}

/** Timestamps must be safe integers so nearby values stay distinct. */
export class InvalidTimestampError extends BufferSyncError {
  constructor(readonly timestamp: number) {
    super(
      "E_INVALID_TIMESTAMP",
      `Timestamp ${timestamp} is not a safe integer`,
    );
  }
}
