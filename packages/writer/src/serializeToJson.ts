import type { WriterConfigurationInput } from "@jsonstream/core/configuration";
import type { ResolutionContext } from "@jsonstream/core/resolution";
import { getDefaultContext } from "./defaults.js";
import { StringSink } from "./sink/StringSink.js";
import { StructuralWriter } from "./writer/StructuralWriter.js";

export type SerializeOptions = WriterConfigurationInput & {
  context?: ResolutionContext;
};

/**
 * Write a single value and return the JSON text.
 */
export function serializeToJson(
  value: unknown,
  options: SerializeOptions = {}
): string {
  const { context, ...writerOptions } = options;
  const sink = new StringSink();
  const writer = new StructuralWriter(
    context ?? getDefaultContext(),
    sink,
    writerOptions
  );
  writer.writeValue(value);
  writer.finish();
  return sink.toString();
}
