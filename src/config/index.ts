export {
  BackoffConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
  EngineConfigSchema,
  loadConfig,
} from "./config.js";
