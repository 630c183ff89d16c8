/**
 * Shared contracts and leaf components of the JSON writer: name encoding,
 * indentation, strategy resolution, errors and configuration.
 */
export * from "./contract/index.js";
export * from "./encoding/index.js";
export * from "./errors/index.js";
export * from "./indentation/index.js";
export * from "./resolution/index.js";
export * from "./configuration/index.js";
export * from "./result/index.js";
export * from "./ecmascript/index.js";
