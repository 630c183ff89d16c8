export { escapeJsonString } from "./escapeJsonString.js";
export {
  quotedFieldNames,
  identifierFieldNames,
  fieldNameEncoderFor,
} from "./FieldNameEncoder.js";
export type { FieldNameEncoder, FieldNamePolicy } from "./FieldNameEncoder.js";
