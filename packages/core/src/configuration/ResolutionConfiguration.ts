import { z } from "zod";

export const ResolutionConfiguration = z.object({
  fieldNames: z
    .enum(["quoted", "identifier"])
    .describe(
      `How property names are written: always quoted, or bare when they are valid identifiers`
    )
    .default("quoted"),
  debug: z
    .boolean()
    .describe(`Enable debug logging for strategy resolution and cache fills`)
    .default(false),
});

export type ResolutionConfiguration = z.infer<typeof ResolutionConfiguration>;
export type ResolutionConfigurationInput = z.input<
  typeof ResolutionConfiguration
>;
