/**
 * A stored value together with the caller-supplied timestamp it was put with.
 * The timestamp unit is up to the caller; it is only ever compared. `put`
 * accepts safe integers only, so values past 2^53 (raw nanoseconds since the
 * epoch) must be scaled first.
 */
export interface Entry<O> {
  value: O;
  timestamp: number;
}

/**
 * Converts a producer's input into the representation a channel stores.
 * May be asynchronous.
 */
export type Transform<I, O> = (input: I) => O | PromiseLike<O>;

/**
 * How a channel turns its input into its output.
 *
 * - `assign`: the input already is an output value
 * - `elementwise`: the input is iterable and the output is collected from its elements
 * - `custom`: a transform is required, per call or as the channel's fallback
 */
export type Conversion<I, O> =
  | { kind: "assign"; assign: (input: I) => O }
  | { kind: "elementwise"; collect: (input: I) => O }
  | { kind: "custom"; fallback?: Transform<I, O> };

export type ConversionKind = Conversion<unknown, unknown>["kind"];

/**
 * Declaration of one channel. `R` records at the type level whether `put`
 * must be given a transform for this channel.
 */
export interface ChannelDefinition<I, O, R extends boolean = boolean> {
  readonly name: string;
  readonly conversion: Conversion<I, O>;
  readonly requiresTransform: R;
}

export type AnyChannelDefinition = ChannelDefinition<never, unknown>;

export type ChannelDefinitions = readonly AnyChannelDefinition[];

export type InputOf<D> = D extends ChannelDefinition<infer I, unknown> ? I : never;

export type OutputOf<D> = D extends ChannelDefinition<never, infer O> ? O : never;

/** Numeric literal union of the channel indices of `D`, e.g. `0 | 1 | 2`. */
export type ChannelIndex<D extends ChannelDefinitions> = Extract<
  {
    [K in keyof D]: K extends `${infer N extends number}` ? N : never;
  }[number],
  number
>;

/** Trailing arguments of `put`: the transform is mandatory where the channel needs one. */
export type TransformArgs<D> =
  D extends ChannelDefinition<infer I, infer O, true>
    ? [transform: Transform<I, O>]
    : D extends ChannelDefinition<infer I, infer O>
      ? [transform?: Transform<I, O>]
      : never;

/** One optional output per channel, in channel order. */
export type ReadResult<D extends ChannelDefinitions> = {
  -readonly [K in keyof D]: OutputOf<D[K]> | undefined;
};

/** One optional output per selected channel, in the order they were selected. */
export type SubsetResult<
  D extends ChannelDefinitions,
  S extends readonly ChannelIndex<D>[],
> = {
  -readonly [K in keyof S]: S[K] extends keyof D
    ? OutputOf<D[S[K]]> | undefined
    : never;
};

export interface BufferSyncOptions {
  /** Entries kept per channel. Defaults to `BUFFER_QUEUE_SIZE`. */
  queueSize?: number;
  /** Monotonic clock used for write-time bookkeeping. */
  now?: () => number;
  monitor?: IBufferMonitor;
}

export interface CloseReport {
  /** Jobs dropped from the queue before they started. */
  discarded: number;
  /** Entries inserted over the buffer's lifetime. */
  inserted: number;
}

export type CounterType =
  | "puts"
  | "inserts"
  | "evictions"
  | "jobsFailed"
  | "jobsDiscarded"
  | "reads"
  | "fastPathReads"
  | "noValue";

export interface IBufferMonitor {
  readonly mode: "disabled" | "counters";
  increment(counter: CounterType, amount?: number): void;
  getCounters(): Record<CounterType, number>;
  flush(): void;
  reset(): void;
}
