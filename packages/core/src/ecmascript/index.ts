export { IDENTIFIER_PATTERN, isValidIdentifier, isReservedWord } from "./identifier.js";
