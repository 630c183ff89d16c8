import type { ResolutionContext } from "../resolution/ResolutionContext.js";

/**
 * Append-only character sink. Writers never seek or rewind.
 */
export interface JsonSink {
  write(chunk: string): void;
}

/**
 * Operations a caller, or a strategy emitting a nested value, may invoke on
 * a writer session. Every method throws a `JsonWriterError` when called out
 * of order.
 */
export interface JsonWriter {
  readonly context: ResolutionContext;

  beginArray(): void;
  endArray(): void;
  beginObject(): void;
  endObject(): void;

  /**
   * Write a value at the current position. `null` and `undefined` become
   * `null`; anything else is handed to the strategy resolved for its type.
   */
  writeValue(value: unknown): void;

  writeProperty(name: string, value: unknown): void;

  /**
   * Write only the name of a property. Exactly one `beginArray`,
   * `beginObject` or `writeValue` must follow.
   */
  writeComplexProperty(name: string): void;

  /**
   * Emit a preformatted scalar token as the value a strategy was asked to
   * write. Only legal from inside a strategy.
   */
  writeLiteral(token: string): void;
}

/**
 * Serialization logic for values of one type.
 */
export interface JsonStrategy<T = unknown> {
  serialize(value: T, writer: JsonWriter): void;
}
