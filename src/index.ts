export * from "./agents/index.js";
export * from "./artifacts/index.js";
export * from "./config/index.js";
export * from "./engine/index.js";
export * from "./events/index.js";
export * from "./llm/index.js";
export * from "./objectives/index.js";
export * from "./operations/index.js";
export * from "./phases/index.js";
export * from "./renderers/index.js";
export * from "./schemas/index.js";
export * from "./session/index.js";
export * from "./tools/index.js";
