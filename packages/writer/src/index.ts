export { StructuralWriter } from "./writer/StructuralWriter.js";
export type { Frame, FrameState, SlotState } from "./writer/Frame.js";
export {
  compactLayout,
  createPrettyLayout,
  type JsonLayout,
} from "./writer/layout.js";
export { StringSink, FileDescriptorSink } from "./sink/index.js";
export * from "./strategies/index.js";
export * from "./reference/index.js";
export { createDefaultContext, getDefaultContext } from "./defaults.js";
export { serializeToJson, type SerializeOptions } from "./serializeToJson.js";
