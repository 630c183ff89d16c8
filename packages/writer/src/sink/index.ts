export { StringSink } from "./StringSink.js";
export { FileDescriptorSink } from "./FileDescriptorSink.js";
