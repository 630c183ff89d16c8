export type JsonWriterErrorCode =
  | "PROTOCOL_VIOLATION"
  | "UNRESOLVED_TYPE"
  | "STRATEGY_INVOCATION"
  | "SINK_IO"
  | "CIRCULAR_STRUCTURE";

/**
 * Base class of every error raised by a writer session or a resolution
 * context. A writer that has thrown one of these must be discarded.
 */
export abstract class JsonWriterError extends Error {
  abstract readonly code: JsonWriterErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A structural method was called in a state that forbids it.
 */
export class ProtocolViolation extends JsonWriterError {
  readonly code = "PROTOCOL_VIOLATION";

  constructor(
    readonly operation: string,
    readonly state: string,
    detail?: string,
    options?: ErrorOptions
  ) {
    super(
      `Cannot call ${operation}() in ${state} state` +
        (detail ? `: ${detail}` : ""),
      options
    );
  }
}

export class UnresolvedTypeError extends JsonWriterError {
  readonly code = "UNRESOLVED_TYPE";

  constructor(readonly typeName: string) {
    super(`No JSON strategy applies to type ${typeName}`);
  }
}

/**
 * The strategy chosen for a value threw while emitting it. The original
 * error is kept as `cause`.
 */
export class StrategyInvocationError extends JsonWriterError {
  readonly code = "STRATEGY_INVOCATION";

  constructor(
    readonly typeName: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`Strategy for ${typeName} failed: ${message}`, options);
  }
}

export class SinkIOError extends JsonWriterError {
  readonly code = "SINK_IO";

  constructor(cause: unknown) {
    super(
      `Output sink failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class CircularStructureError extends JsonWriterError {
  readonly code = "CIRCULAR_STRUCTURE";

  constructor(readonly typeName: string) {
    super(`Value of type ${typeName} contains a reference to itself`);
  }
}
