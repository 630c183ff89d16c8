import type { WriterConfigurationInput } from "@jsonstream/core/configuration";
import type { ResolutionContext } from "@jsonstream/core/resolution";
import { createDefaultContext } from "../../src/defaults.js";
import { StringSink } from "../../src/sink/StringSink.js";
import { StructuralWriter } from "../../src/writer/StructuralWriter.js";

export type TestWriter = {
  writer: StructuralWriter;
  output: () => string;
};

/**
 * Writer over an in-memory sink, using the built-in strategies unless a
 * context is given.
 */
export function createTestWriter(
  options: WriterConfigurationInput = {},
  context: ResolutionContext = createDefaultContext()
): TestWriter {
  const sink = new StringSink();
  const writer = new StructuralWriter(context, sink, options);
  return { writer, output: () => sink.toString() };
}
