import { implementCapability } from "@jsonstream/core/resolution";
import { ReferenceCapability, type Reference } from "./Reference.js";

export class StringReference implements Reference<string> {
  readonly title: string;

  constructor(
    readonly id: string,
    title?: string
  ) {
    this.title = title ?? id;
  }

  equals(other: unknown): boolean {
    return (
      other instanceof StringReference &&
      other.constructor === this.constructor &&
      other.id === this.id
    );
  }

  toString(): string {
    return `{id:${this.id}, title:${this.title}}`;
  }
}

implementCapability(StringReference, ReferenceCapability);
