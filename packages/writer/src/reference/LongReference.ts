import { implementCapability } from "@jsonstream/core/resolution";
import { ReferenceCapability, type Reference } from "./Reference.js";

/**
 * Reference whose key is an integer. The title defaults to the key's
 * decimal form.
 */
export class LongReference implements Reference<number> {
  readonly title: string;

  constructor(
    readonly id: number,
    title?: string
  ) {
    if (!Number.isSafeInteger(id)) {
      throw new RangeError(`Reference id must be a safe integer, got ${id}`);
    }
    this.title = title ?? String(id);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof LongReference &&
      other.constructor === this.constructor &&
      other.id === this.id
    );
  }

  toString(): string {
    return `{id:${this.id}, title:${this.title}}`;
  }
}

implementCapability(LongReference, ReferenceCapability);
