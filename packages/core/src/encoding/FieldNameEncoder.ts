import { isReservedWord, isValidIdentifier } from "../ecmascript/identifier.js";
import { escapeJsonString } from "./escapeJsonString.js";

/**
 * Turns a property name into the token written before `": "`.
 */
export interface FieldNameEncoder {
  encode(name: string): string;
}

/**
 * Standard JSON: every name is a quoted, escaped string.
 */
export const quotedFieldNames: FieldNameEncoder = {
  encode: (name) => escapeJsonString(name),
};

/**
 * Relaxed dialect (JSON5, JavaScript object literals): names that are plain
 * identifiers are written bare, everything else falls back to quoting.
 */
export const identifierFieldNames: FieldNameEncoder = {
  encode: (name) =>
    isValidIdentifier(name) && !isReservedWord(name)
      ? name
      : escapeJsonString(name),
};

export type FieldNamePolicy = "quoted" | "identifier";

export function fieldNameEncoderFor(policy: FieldNamePolicy): FieldNameEncoder {
  switch (policy) {
    case "quoted":
      return quotedFieldNames;
    case "identifier":
      return identifierFieldNames;
  }
}
