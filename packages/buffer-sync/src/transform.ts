import { MissingTransformError, ConfigurationError } from "./errors";
import type { ChannelDefinition, Transform } from "./domain";

/** Channel whose input and output are the same type. */
export function sameType<T>(name: string): ChannelDefinition<T, T, false> {
  return {
    name,
    conversion: { kind: "assign", assign: (input: T): T => input },
    requiresTransform: false,
  };
}

/** Channel whose input type is assignable to its output type. */
export function assignable<I extends O, O>(
  name: string,
): ChannelDefinition<I, O, false> {
  return {
    name,
    conversion: { kind: "assign", assign: (input: I): O => input },
    requiresTransform: false,
  };
}

/**
 * Channel that takes any iterable of `E` and stores the collection built by
 * `collect`, e.g. `Array.from` or `(xs) => new Set(xs)`.
 */
export function elementwise<E, O>(
  name: string,
  collect: (items: Iterable<E>) => O,
): ChannelDefinition<Iterable<E>, O, false> {
  return {
    name,
    conversion: {
      kind: "elementwise",
      collect: (input: Iterable<E>): O => {
        if (!isIterable(input)) {
          throw new TypeError(`Channel "${name}" expects an iterable input`);
        }
        return collect(input);
      },
    },
    requiresTransform: false,
  };
}

/** Channel that needs a transform; `put` must pass one. */
export function custom<I, O>(name: string): ChannelDefinition<I, O, true>;
/** Channel that needs a transform; `fallback` is used when `put` passes none. */
export function custom<I, O>(
  name: string,
  fallback: Transform<I, O>,
): ChannelDefinition<I, O, false>;
export function custom<I, O>(
  name: string,
  fallback?: Transform<I, O>,
): ChannelDefinition<I, O> {
  return {
    name,
    conversion: { kind: "custom", fallback },
    requiresTransform: fallback === undefined,
  };
}

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === "string") return true;
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Pick the conversion for one `put` call. Assign and elementwise channels
 * ignore `transform`; custom channels use it, else their fallback.
 *
 * Runs synchronously on the caller, so a missing transform fails the `put`
 * itself rather than the deferred job.
 */
export function resolveConversion<I, O>(
  definition: ChannelDefinition<I, O>,
  transform?: Transform<I, O>,
): Transform<I, O> {
  const { conversion } = definition;

  switch (conversion.kind) {
    case "assign":
      return conversion.assign;
    case "elementwise":
      return conversion.collect;
    case "custom": {
      const resolved = transform ?? conversion.fallback;
      if (!resolved) throw new MissingTransformError(definition.name);
      return resolved;
    }
  }
}

export function validateDefinitions(
  definitions: readonly ChannelDefinition<never, unknown>[],
): void {
  if (definitions.length === 0) {
    throw new ConfigurationError("A buffer needs at least one channel");
  }

  const seen = new Set<string>();
  for (const definition of definitions) {
    if (!definition.name) {
      throw new ConfigurationError("Channel names must not be empty");
    }
    if (seen.has(definition.name)) {
      throw new ConfigurationError(
        `Duplicate channel name "${definition.name}"`,
      );
    }
    seen.add(definition.name);
  }
}
