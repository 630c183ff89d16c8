import type { JsonStrategy } from "@jsonstream/core/contract";
import { escapeJsonString } from "@jsonstream/core/encoding";

export const stringStrategy: JsonStrategy<string> = {
  serialize: (value, writer) => writer.writeLiteral(escapeJsonString(value)),
};

// NaN and the infinities have no JSON form
export const numberStrategy: JsonStrategy<number> = {
  serialize: (value, writer) =>
    writer.writeLiteral(Number.isFinite(value) ? String(value) : "null"),
};

export const booleanStrategy: JsonStrategy<boolean> = {
  serialize: (value, writer) => writer.writeLiteral(value ? "true" : "false"),
};

export const bigintStrategy: JsonStrategy<bigint> = {
  serialize: (value, writer) => writer.writeLiteral(value.toString()),
};
