export type { OperationState, RegisterOpts, ToolOperation } from "./types.js";
export { OperationError } from "./errors.js";
export type { OperationErrorCode } from "./errors.js";
export { cancelledOutput, OperationTracker } from "./tracker.js";
