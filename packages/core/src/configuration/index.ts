export { WriterConfiguration } from "./WriterConfiguration.js";
export type { WriterConfigurationInput } from "./WriterConfiguration.js";
export { ResolutionConfiguration } from "./ResolutionConfiguration.js";
export type { ResolutionConfigurationInput } from "./ResolutionConfiguration.js";
