import type { JsonStrategy } from "@jsonstream/core/contract";
import { arrayStrategy, iterableStrategy, mapStrategy } from "./collections.js";

type WithToJSON = { toJSON: () => unknown };

const hasToJSON = (value: object): value is WithToJSON =>
  "toJSON" in value && typeof value.toJSON === "function";

/**
 * Own enumerable string-keyed properties, in insertion order. Properties
 * holding `undefined`, functions or symbols are left out. A `toJSON()`
 * method replaces the object with whatever it returns.
 *
 * Boxed primitives are written as the primitive, and subclasses of `Array`,
 * `Set` and `Map` as the collection they extend.
 */
export const plainObjectStrategy: JsonStrategy<unknown> = {
  serialize: (value, writer) => {
    if (typeof value !== "object" || value === null) {
      throw new TypeError(`Cannot write a ${typeof value} as a JSON object`);
    }
    if (hasToJSON(value)) {
      writer.writeValue(value.toJSON());
      return;
    }
    if (
      value instanceof Number ||
      value instanceof String ||
      value instanceof Boolean
    ) {
      writer.writeValue(value.valueOf());
      return;
    }
    if (Array.isArray(value)) {
      arrayStrategy.serialize(value, writer);
      return;
    }
    if (value instanceof Map) {
      mapStrategy.serialize(value, writer);
      return;
    }
    if (value instanceof Set) {
      iterableStrategy.serialize(value, writer);
      return;
    }

    writer.beginObject();
    for (const [key, item] of Object.entries(value)) {
      if (
        item === undefined ||
        typeof item === "function" ||
        typeof item === "symbol"
      ) {
        continue;
      }
      writer.writeProperty(key, item);
    }
    writer.endObject();
  },
};
