export {
  JsonWriterError,
  ProtocolViolation,
  UnresolvedTypeError,
  StrategyInvocationError,
  SinkIOError,
  CircularStructureError,
} from "./JsonWriterError.js";
export type { JsonWriterErrorCode } from "./JsonWriterError.js";
