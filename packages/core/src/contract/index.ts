export type { JsonSink, JsonWriter, JsonStrategy } from "./types.js";
