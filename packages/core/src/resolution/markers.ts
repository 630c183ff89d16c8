import type { JsonStrategy } from "../contract/types.js";
import type { Capability } from "./capability.js";
import type { Constructor } from "./types.js";

/**
 * "Use this strategy for this type", attached to the type itself.
 * `inherited` extends the marker to subclasses and implementors.
 */
export type StrategyMarker = {
  strategy: JsonStrategy;
  inherited: boolean;
};

export type MarkerTarget = Constructor | Capability;

const markerStorage = new WeakMap<MarkerTarget, StrategyMarker>();

export const useJsonStrategy = <T>(
  type: Constructor<T> | Capability<T>,
  strategy: JsonStrategy<T>,
  options: { inherited?: boolean } = {}
): void => {
  markerStorage.set(type, {
    strategy,
    inherited: options.inherited ?? false,
  });
};

export const getJsonStrategyMarker = (
  type: MarkerTarget
): StrategyMarker | undefined => markerStorage.get(type);
