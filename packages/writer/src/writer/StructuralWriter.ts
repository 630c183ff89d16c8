import {
  WriterConfiguration,
  type WriterConfigurationInput,
} from "@jsonstream/core/configuration";
import type { JsonSink, JsonWriter } from "@jsonstream/core/contract";
import {
  CircularStructureError,
  JsonWriterError,
  ProtocolViolation,
  SinkIOError,
  StrategyInvocationError,
} from "@jsonstream/core/errors";
import { IndentCache } from "@jsonstream/core/indentation";
import {
  describeType,
  typeKeyOf,
  type ResolutionContext,
} from "@jsonstream/core/resolution";
import { createFrame, type Frame } from "./Frame.js";
import { layoutFor, type JsonLayout } from "./layout.js";

type Operation =
  | "beginArray"
  | "endArray"
  | "beginObject"
  | "endObject"
  | "writeValue"
  | "writeProperty"
  | "writeComplexProperty"
  | "writeLiteral"
  | "finish";

type ContainerKind = "array" | "object";

/**
 * Protocol-enforcing JSON writer over an append-only sink.
 *
 * Each nesting level is a {@link Frame} on an explicit stack. Every public
 * operation checks the current frame's state, emits its tokens and moves the
 * state machine; anything out of order throws {@link ProtocolViolation}.
 * Once an operation has thrown, the session is poisoned and every further
 * call throws as well.
 *
 * Non-null values are written by the strategy the resolution context picks
 * for their runtime type. While the strategy runs, the frame's slot is open:
 * the strategy must emit exactly one value (a container, a nested
 * `writeValue`, or a `writeLiteral` token) and no separator is written for it.
 *
 * Not safe for concurrent use; one session per output stream.
 */
export class StructuralWriter implements JsonWriter {
  readonly configuration: WriterConfiguration;

  private readonly layout: JsonLayout;
  private readonly indents: IndentCache;
  private readonly ancestors: Frame[] = [];
  private current: Frame = createFrame(0, "", "unknown");
  /** Objects whose strategy is currently running, for cycle detection. */
  private readonly active = new Set<object>();
  private poisoned = false;
  private failure: unknown;

  constructor(
    readonly context: ResolutionContext,
    private readonly sink: JsonSink,
    options: WriterConfigurationInput = {}
  ) {
    this.configuration = WriterConfiguration.parse(options);
    this.layout = layoutFor(this.configuration);
    this.indents = IndentCache.forFactor(this.configuration.indentFactor);
  }

  /** Nesting depth of the current frame; 0 at the top level. */
  get depth(): number {
    return this.current.depth;
  }

  /** True once exactly one top-level value has been written in full. */
  get isComplete(): boolean {
    return (
      !this.poisoned &&
      this.ancestors.length === 0 &&
      this.current.itemCount > 0 &&
      this.current.slot === "closed"
    );
  }

  beginArray(): void {
    this.run("beginArray", () => this.beginContainer("beginArray", "array"));
  }

  endArray(): void {
    this.run("endArray", () => this.endContainer("endArray", "array"));
  }

  beginObject(): void {
    this.run("beginObject", () => this.beginContainer("beginObject", "object"));
  }

  endObject(): void {
    this.run("endObject", () => this.endContainer("endObject", "object"));
  }

  writeValue(value: unknown): void {
    this.run("writeValue", () => {
      const frame = this.current;
      this.assertSlotNotFilled("writeValue", frame);

      // A strategy handing its slot on to another value
      if (frame.slot === "open") {
        this.writeSlotValue(frame, value);
        frame.slot = "filled";
        return;
      }

      switch (frame.state) {
        case "unknown":
          if (frame.itemCount > 0) {
            throw this.violation(
              "writeValue",
              "a top-level value was already written"
            );
          }
          frame.itemCount = 1;
          this.writeSlotValue(frame, value);
          return;
        case "array":
          this.emit(this.layout.memberBreak(frame, frame.itemCount++ === 0));
          this.writeSlotValue(frame, value);
          return;
        case "objattr":
          this.writeSlotValue(frame, value);
          frame.state = "object";
          return;
        case "object":
          throw this.violation(
            "writeValue",
            "use writeProperty() to write inside an object"
          );
      }
    });
  }

  writeProperty(name: string, value: unknown): void {
    this.run("writeProperty", () => {
      const frame = this.writeName("writeProperty", name);
      frame.state = "objattr";
      this.writeSlotValue(frame, value);
      frame.state = "object";
    });
  }

  writeComplexProperty(name: string): void {
    this.run("writeComplexProperty", () => {
      const frame = this.writeName("writeComplexProperty", name);
      frame.state = "objattr";
    });
  }

  writeLiteral(token: string): void {
    this.run("writeLiteral", () => {
      const frame = this.current;
      this.assertSlotNotFilled("writeLiteral", frame);
      if (frame.slot !== "open") {
        throw this.violation(
          "writeLiteral",
          "literals can only be written by a strategy"
        );
      }
      this.emit(token);
      frame.slot = "filled";
    });
  }

  /**
   * Check that the session holds exactly one complete top-level value.
   */
  finish(): void {
    this.run("finish", () => {
      if (this.ancestors.length > 0) {
        throw this.violation(
          "finish",
          `${this.ancestors.length} container(s) still open`
        );
      }
      if (this.current.itemCount === 0) {
        throw this.violation("finish", "no value was written");
      }
    });
  }

  private beginContainer(operation: Operation, kind: ContainerKind): void {
    const frame = this.current;
    this.assertSlotNotFilled(operation, frame);
    const delegated = frame.slot === "open";
    const token = kind === "array" ? "[" : "{";

    switch (frame.state) {
      case "unknown":
        if (!delegated && frame.itemCount > 0) {
          throw this.violation(operation, "a top-level value was already written");
        }
        frame.itemCount = 1;
        this.emit(token);
        break;
      case "array":
        if (!delegated && frame.itemCount++ > 0) {
          this.emit(",");
        }
        this.emit(this.layout.nestedOpen(token));
        break;
      case "objattr":
        frame.state = "object";
        this.emit(token);
        break;
      case "object":
        throw this.violation(
          operation,
          "use writeComplexProperty() before a nested container"
        );
    }

    if (delegated) frame.slot = "filled";
    this.push(kind);
  }

  private endContainer(operation: Operation, kind: ContainerKind): void {
    const frame = this.current;
    if (frame.state !== kind) {
      throw this.violation(operation);
    }
    if (frame.slot !== "closed") {
      throw this.violation(operation, "a strategy is still writing a value here");
    }
    const parent = this.ancestors.pop();
    if (!parent) {
      throw this.violation(operation, "no container is open");
    }
    this.emit(this.layout.beforeClose(frame, parent) + (kind === "array" ? "]" : "}"));
    this.current = parent;
  }

  private writeName(operation: Operation, name: string): Frame {
    const frame = this.current;
    if (frame.state !== "object" || frame.slot !== "closed") {
      throw this.violation(operation);
    }
    this.emit(
      this.layout.memberBreak(frame, frame.itemCount++ === 0) +
        this.context.fieldNameEncoder.encode(name) +
        this.layout.nameSeparator
    );
    return frame;
  }

  private writeSlotValue(frame: Frame, value: unknown): void {
    if (value === null || value === undefined) {
      this.emit("null");
      return;
    }
    this.delegate(frame, value);
  }

  private delegate(frame: Frame, value: NonNullable<unknown>): void {
    const type = typeKeyOf(value);
    const typeName = describeType(type);
    const strategy = this.context.resolve(type);

    const tracked =
      this.configuration.detectCycles && typeof value === "object"
        ? value
        : undefined;
    if (tracked) {
      if (this.active.has(tracked)) {
        throw new CircularStructureError(typeName);
      }
      this.active.add(tracked);
    }

    frame.slot = "open";
    try {
      strategy.serialize(value, this);
    } catch (error) {
      if (error instanceof JsonWriterError) throw error;
      throw new StrategyInvocationError(
        typeName,
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    } finally {
      if (tracked) this.active.delete(tracked);
    }

    if (this.current !== frame) {
      throw new StrategyInvocationError(typeName, "a container was left open");
    }
    if (frame.slot !== "filled") {
      throw new StrategyInvocationError(typeName, "no value was written");
    }
    frame.slot = "closed";
  }

  private push(kind: ContainerKind): void {
    const depth = this.current.depth + 1;
    this.ancestors.push(this.current);
    this.current = createFrame(depth, this.indents.indentFor(depth), kind);
  }

  private emit(chunk: string): void {
    if (chunk.length === 0) return;
    try {
      this.sink.write(chunk);
    } catch (error) {
      throw new SinkIOError(error);
    }
  }

  private assertSlotNotFilled(operation: Operation, frame: Frame): void {
    if (frame.slot === "filled") {
      throw this.violation(operation, "the strategy already wrote its value");
    }
  }

  private violation(operation: Operation, detail?: string): ProtocolViolation {
    return new ProtocolViolation(operation, this.current.state, detail);
  }

  private run(operation: Operation, fn: () => void): void {
    if (this.poisoned) {
      throw new ProtocolViolation(
        operation,
        this.current.state,
        "the writer failed earlier and must be discarded",
        { cause: this.failure }
      );
    }
    try {
      fn();
    } catch (error) {
      if (!this.poisoned) {
        this.poisoned = true;
        this.failure = error;
      }
      throw error;
    }
  }
}
