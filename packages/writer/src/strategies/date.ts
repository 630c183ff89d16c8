import type { JsonStrategy } from "@jsonstream/core/contract";
import { escapeJsonString } from "@jsonstream/core/encoding";

export const dateStrategy: JsonStrategy<Date> = {
  serialize: (value, writer) => {
    if (Number.isNaN(value.getTime())) {
      writer.writeLiteral("null");
      return;
    }
    writer.writeLiteral(escapeJsonString(value.toISOString()));
  },
};
