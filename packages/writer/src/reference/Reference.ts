import type { JsonStrategy } from "@jsonstream/core/contract";
import {
  defineCapability,
  useJsonStrategy,
} from "@jsonstream/core/resolution";

/**
 * Pointer to a business object: its key plus a human-readable title.
 */
export interface Reference<K = unknown> {
  readonly id: K;
  readonly title: string;
}

export const ReferenceCapability = defineCapability<Reference>("Reference");

/**
 * Writes any reference as `{ "id": ..., "title": ... }`.
 */
export const referenceStrategy: JsonStrategy<Reference> = {
  serialize: (value, writer) => {
    writer.beginObject();
    writer.writeProperty("id", value.id);
    writer.writeProperty("title", value.title);
    writer.endObject();
  },
};

useJsonStrategy(ReferenceCapability, referenceStrategy, { inherited: true });
