import type { JsonStrategy } from "../contract/types.js";
import {
  fieldNameEncoderFor,
  type FieldNameEncoder,
} from "../encoding/FieldNameEncoder.js";
import {
  ResolutionConfiguration,
  type ResolutionConfigurationInput,
} from "../configuration/ResolutionConfiguration.js";
import { UnresolvedTypeError } from "../errors/JsonWriterError.js";
import { flattenOption, none, some, type Option } from "../result/result.js";
import { getCapabilities, type Capability } from "./capability.js";
import { getJsonStrategyMarker } from "./markers.js";
import {
  describeType,
  isConstructor,
  typeKeyOf,
  type Constructor,
  type PrimitiveTypeName,
  type PrimitiveValueOf,
  type TypeKey,
} from "./types.js";

export type ResolutionContextOptions = ResolutionConfigurationInput & {
  /** Overrides the encoder picked by `fieldNames`. */
  fieldNameEncoder?: FieldNameEncoder;
  /** Receives debug lines when `debug` is on. Defaults to console.debug. */
  log?: (message: string) => void;
};

type ResolutionStep = "registration" | "marker" | "inherited" | "fallback";

type Resolution = { strategy: JsonStrategy; step: ResolutionStep; from: TypeKey };

/**
 * Maps runtime types to the strategy that writes them. Lookup order:
 * explicit registration, a marker on the type itself, the nearest ancestor
 * carrying an inherited marker, then the fallback. Results are cached per
 * concrete type.
 *
 * Usage:
 * const context = new ResolutionContext()
 *   .register("number", numberStrategy)
 *   .setFallback(plainObjectStrategy);
 * const strategy = context.resolveFor(42);
 */
export class ResolutionContext {
  readonly fieldNameEncoder: FieldNameEncoder;

  private readonly registrations = new Map<TypeKey, JsonStrategy>();
  private readonly cache = new Map<TypeKey, JsonStrategy>();
  private fallback: JsonStrategy | undefined;
  private readonly debug: boolean;
  private readonly log: (message: string) => void;

  constructor(options: ResolutionContextOptions = {}) {
    const { fieldNameEncoder, log, ...rest } = options;
    const configuration = ResolutionConfiguration.parse(rest);
    this.fieldNameEncoder =
      fieldNameEncoder ?? fieldNameEncoderFor(configuration.fieldNames);
    this.debug = configuration.debug;
    this.log = log ?? ((message) => console.debug(message));
  }

  register<K extends PrimitiveTypeName>(
    type: K,
    strategy: JsonStrategy<PrimitiveValueOf[K]>
  ): this;
  register<T>(type: Constructor<T>, strategy: JsonStrategy<T>): this;
  register(type: TypeKey, strategy: JsonStrategy): this {
    this.registrations.set(type, strategy);
    this.cache.clear();
    return this;
  }

  setFallback(strategy: JsonStrategy | undefined): this {
    this.fallback = strategy;
    this.cache.clear();
    return this;
  }

  resolve(type: TypeKey): JsonStrategy {
    const strategy = flattenOption(this.tryResolve(type));
    if (!strategy) {
      throw new UnresolvedTypeError(describeType(type));
    }
    return strategy;
  }

  resolveFor(value: unknown): JsonStrategy {
    return this.resolve(typeKeyOf(value));
  }

  tryResolve(type: TypeKey): Option<JsonStrategy> {
    const cached = this.cache.get(type);
    if (cached) return some(cached);

    const resolution = this.lookup(type);
    if (!resolution) {
      if (this.debug) this.log(`resolve ${describeType(type)}: unresolved`);
      return none();
    }

    if (this.debug) {
      this.log(
        `resolve ${describeType(type)}: ${resolution.step} via ${describeType(resolution.from)}`
      );
    }
    // Recomputing the same key yields the same strategy, so a repeated
    // fill is harmless.
    this.cache.set(type, resolution.strategy);
    return some(resolution.strategy);
  }

  private lookup(type: TypeKey): Resolution | undefined {
    const registered = this.registrations.get(type);
    if (registered) {
      return { strategy: registered, step: "registration", from: type };
    }

    if (typeof type !== "string") {
      const marker = getJsonStrategyMarker(type);
      if (marker) {
        return { strategy: marker.strategy, step: "marker", from: type };
      }

      for (const ancestor of ancestorsOf(type)) {
        const inherited = getJsonStrategyMarker(ancestor);
        if (inherited?.inherited) {
          return {
            strategy: inherited.strategy,
            step: "inherited",
            from: ancestor,
          };
        }
      }
    }

    if (this.fallback) {
      return { strategy: this.fallback, step: "fallback", from: type };
    }
    return undefined;
  }
}

/**
 * Ancestors of a type, most specific first: superclasses nearest first,
 * then capabilities breadth-first (those of the type, then of each
 * superclass, then the capabilities they extend).
 */
export function* ancestorsOf(
  type: Constructor | Capability
): Generator<Constructor | Capability> {
  const chain: Constructor[] = [];
  const queue: Capability[] = [];

  if (isConstructor(type)) {
    chain.push(type);
    let parent: unknown = Object.getPrototypeOf(type);
    while (isConstructor(parent) && parent !== Function.prototype) {
      chain.push(parent);
      yield parent;
      parent = Object.getPrototypeOf(parent);
    }
    for (const ctor of chain) {
      queue.push(...getCapabilities(ctor));
    }
  } else {
    queue.push(...type.parents);
  }

  const visited = new Set<Capability>();
  while (queue.length > 0) {
    const capability = queue.shift();
    if (!capability || visited.has(capability)) continue;
    visited.add(capability);
    yield capability;
    queue.push(...capability.parents);
  }
}
