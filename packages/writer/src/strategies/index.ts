export {
  stringStrategy,
  numberStrategy,
  booleanStrategy,
  bigintStrategy,
} from "./primitives.js";
export { arrayStrategy, iterableStrategy, mapStrategy } from "./collections.js";
export { dateStrategy } from "./date.js";
export { plainObjectStrategy } from "./plainObject.js";
