import type { JsonStrategy } from "@jsonstream/core/contract";

/**
 * Arrays element by element; holes are read as `undefined` and come out as
 * `null`.
 */
export const arrayStrategy: JsonStrategy<readonly unknown[]> = {
  serialize: (value, writer) => {
    writer.beginArray();
    for (let i = 0; i < value.length; i++) {
      writer.writeValue(value[i]);
    }
    writer.endArray();
  },
};

export const iterableStrategy: JsonStrategy<Iterable<unknown>> = {
  serialize: (value, writer) => {
    writer.beginArray();
    for (const item of value) {
      writer.writeValue(item);
    }
    writer.endArray();
  },
};

/**
 * Maps as objects; keys go through `String()`. Two keys with the same string
 * form, such as `1` and `"1"`, are rejected instead of writing a duplicate
 * property.
 */
export const mapStrategy: JsonStrategy<ReadonlyMap<unknown, unknown>> = {
  serialize: (value, writer) => {
    writer.beginObject();
    const names = new Set<string>();
    for (const [key, item] of value) {
      const name = String(key);
      if (names.has(name)) {
        throw new TypeError(`Map keys collide as property "${name}"`);
      }
      names.add(name);
      writer.writeProperty(name, item);
    }
    writer.endObject();
  },
};
