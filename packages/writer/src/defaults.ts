import {
  ResolutionContext,
  type ResolutionContextOptions,
} from "@jsonstream/core/resolution";
import {
  arrayStrategy,
  bigintStrategy,
  booleanStrategy,
  dateStrategy,
  iterableStrategy,
  mapStrategy,
  numberStrategy,
  plainObjectStrategy,
  stringStrategy,
} from "./strategies/index.js";
// Attaches the reference strategy marker
import "./reference/Reference.js";

/**
 * Context with strategies for JavaScript's built-in value types. Plain
 * objects double as the fallback, so instances of unregistered classes are
 * written from their own enumerable properties.
 */
export function createDefaultContext(
  options: ResolutionContextOptions = {}
): ResolutionContext {
  return new ResolutionContext(options)
    .register("string", stringStrategy)
    .register("number", numberStrategy)
    .register("boolean", booleanStrategy)
    .register("bigint", bigintStrategy)
    .register(Array, arrayStrategy)
    .register(Set, iterableStrategy)
    .register(Map, mapStrategy)
    .register(Date, dateStrategy)
    .register(Object, plainObjectStrategy)
    .setFallback(plainObjectStrategy);
}

let defaultContext: ResolutionContext | undefined;

/**
 * Lazily created context shared by callers that do not bring their own.
 */
export function getDefaultContext(): ResolutionContext {
  defaultContext ??= createDefaultContext();
  return defaultContext;
}
