import type { WriterConfiguration } from "@jsonstream/core/configuration";
import type { Frame } from "./Frame.js";

/**
 * Whitespace policy of a writer. The state machine decides which tokens are
 * written; the layout decides what surrounds them.
 */
export interface JsonLayout {
  /** Written before a scalar array element or an object property. */
  memberBreak(frame: Frame, first: boolean): string;
  /** Opening token of a container placed directly inside an array. */
  nestedOpen(token: "[" | "{"): string;
  /** Written before the closing token of `frame`. */
  beforeClose(frame: Frame, parent: Frame): string;
  readonly nameSeparator: string;
}

export const createPrettyLayout = (
  options: Pick<WriterConfiguration, "compactEmptyContainers">
): JsonLayout => ({
  memberBreak: (frame, first) => (first ? "\n" : ",\n") + frame.indent,
  nestedOpen: (token) => " " + token,
  beforeClose: (frame, parent) =>
    options.compactEmptyContainers && frame.itemCount === 0
      ? ""
      : "\n" + parent.indent,
  nameSeparator: ": ",
});

export const compactLayout: JsonLayout = {
  memberBreak: (_frame, first) => (first ? "" : ","),
  nestedOpen: (token) => token,
  beforeClose: () => "",
  nameSeparator: ":",
};

export const layoutFor = (configuration: WriterConfiguration): JsonLayout =>
  configuration.format === "compact"
    ? compactLayout
    : createPrettyLayout(configuration);
