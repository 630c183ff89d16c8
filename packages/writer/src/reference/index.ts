export {
  ReferenceCapability,
  referenceStrategy,
  type Reference,
} from "./Reference.js";
export { LongReference } from "./LongReference.js";
export { StringReference } from "./StringReference.js";
