export { ResolutionContext, ancestorsOf } from "./ResolutionContext.js";
export type { ResolutionContextOptions } from "./ResolutionContext.js";
export {
  Capability,
  defineCapability,
  implementCapability,
  getCapabilities,
} from "./capability.js";
export { useJsonStrategy, getJsonStrategyMarker } from "./markers.js";
export type { StrategyMarker, MarkerTarget } from "./markers.js";
export { typeKeyOf, isConstructor, describeType } from "./types.js";
export type {
  Constructor,
  PrimitiveTypeName,
  PrimitiveValueOf,
  TypeKey,
} from "./types.js";
