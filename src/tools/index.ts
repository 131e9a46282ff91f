export { type Tool, type ToolSpec, ToolRegistry, defineTool, parseArguments } from "./define.js";
export { ToolError, type ToolErrorCode, toToolErrorPayload } from "./errors.js";
export { type Availability, ToolGate } from "./gate.js";
export { type JsonSchema, type SchemaNode, fromZod, toJsonSchema } from "./schema.js";
