export type {
  ChatMessage,
  LlmClient,
  LlmErrorCode,
  LlmRequest,
  LlmResponse,
  LlmUsage,
  ToolCall,
  ToolDefinition,
} from "./types.js";
export { LlmError } from "./types.js";
export { completeWithRetry, type RetryOpts } from "./retry.js";
