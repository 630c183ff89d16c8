import type { Constructor } from "./types.js";

/**
 * Runtime stand-in for an interface: classes declare the capabilities they
 * implement so a strategy marked on the capability reaches all of them.
 * `T` is the value shape implementors share.
 */
export class Capability<T = unknown> {
  declare readonly __valueType?: T;

  constructor(
    readonly name: string,
    readonly parents: readonly Capability[] = []
  ) {}
}

export const defineCapability = <T>(
  name: string,
  ...parents: Capability[]
): Capability<T> => new Capability<T>(name, parents);

const implementations = new WeakMap<Constructor, Capability[]>();

export const implementCapability = (
  type: Constructor,
  ...capabilities: Capability[]
): void => {
  const existing = implementations.get(type);
  if (existing) {
    existing.push(...capabilities);
  } else {
    implementations.set(type, [...capabilities]);
  }
};

/**
 * Capabilities declared directly on `type`, not including those of its
 * superclasses.
 */
export const getCapabilities = (type: Constructor): readonly Capability[] =>
  implementations.get(type) ?? [];
