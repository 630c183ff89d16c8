import { z } from "zod";

export const WriterConfiguration = z.object({
  format: z
    .enum(["pretty", "compact"])
    .describe(`"pretty" writes one member per line, "compact" writes no whitespace`)
    .default("pretty"),
  indentFactor: z
    .number()
    .int()
    .min(0)
    .max(16)
    .describe(`Spaces per nesting level in the pretty format`)
    .default(2),
  compactEmptyContainers: z
    .boolean()
    .describe(`Close empty arrays and objects on the same line ("[]", "{}")`)
    .default(false),
  detectCycles: z
    .boolean()
    .describe(`Fail when a value is reached again while it is still being written`)
    .default(true),
});

export type WriterConfiguration = z.infer<typeof WriterConfiguration>;
export type WriterConfigurationInput = z.input<typeof WriterConfiguration>;
