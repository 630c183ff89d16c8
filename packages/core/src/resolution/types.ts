import type { Capability } from "./capability.js";

export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

export type PrimitiveTypeName =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "undefined"
  | "function";

export type PrimitiveValueOf = {
  string: string;
  number: number;
  boolean: boolean;
  bigint: bigint;
  symbol: symbol;
  undefined: undefined;
  function: (...args: never[]) => unknown;
};

/**
 * Identity a strategy is registered and cached under.
 */
export type TypeKey = PrimitiveTypeName | Constructor | Capability;

/**
 * Runtime type of a value: its `typeof` for primitives, otherwise the
 * constructor of its prototype. Null-prototype objects count as `Object`.
 */
export function typeKeyOf(value: unknown): TypeKey {
  if (value === null) return Object;
  const kind = typeof value;
  if (kind !== "object") return kind;

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || typeof proto !== "object") return Object;
  const ctor: unknown = proto.constructor;
  return isConstructor(ctor) ? ctor : Object;
}

export function isConstructor(value: unknown): value is Constructor {
  return typeof value === "function" && value.prototype !== undefined;
}

export function describeType(type: TypeKey): string {
  if (typeof type === "string") return type;
  if (typeof type === "function") return type.name || "<anonymous class>";
  return `capability ${type.name}`;
}
