export * from "./ceg/index.js";
export * from "./trees/index.js";
export { getConfig, type Config } from "./config/index.js";
export {
  CegError,
  GenerationStateError,
  IneligibleMergeError,
  MalformedGraphError,
  StageAssignmentError,
  UnknownEdgeError,
  UnknownNodeError,
  toErrorV1,
  type ErrorCode,
  type ErrorV1,
} from "./utils/errors.js";
export { TelemetryEvents, type TelemetryEventName } from "./utils/telemetry.js";
export { Graph as GraphSchema, type GraphInputT, type GraphT } from "./schemas/graph.js";
