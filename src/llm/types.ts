import type { JsonSchema } from "../tools/schema.js";

export interface ToolCall {
  call_id: string; // opaque, provider-supplied
  name: string;
  arguments: string; // JSON string
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; tool_calls?: ToolCall[] }
  | { role: "tool"; call_id: string; content: string };

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JsonSchema;
}

export interface LlmRequest {
  messages: ChatMessage[];
  tools: ToolDefinition[];
  tool_choice?: "auto" | "required" | "none";
  max_tokens?: number;
}

export interface LlmUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface LlmResponse {
  text: string;
  tool_calls: ToolCall[];
  usage: LlmUsage;
  finish_reason: "stop" | "tool_calls" | "length";
}

/**
 * Provider-agnostic completion capability. Transport adapters for specific
 * vendors live outside the engine and implement this interface.
 */
export interface LlmClient {
  complete(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse>;
}

export type LlmErrorCode =
  | "RATE_LIMITED"
  | "TIMEOUT"
  | "PROVIDER_ERROR"
  | "INVALID_RESPONSE";

export class LlmError extends Error {
  constructor(
    public readonly code: LlmErrorCode,
    message: string,
    public readonly retryable: boolean = code !== "INVALID_RESPONSE",
  ) {
    super(message);
    this.name = "LlmError";
  }
}
