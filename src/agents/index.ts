export {
  type SubAgentDispatcherDeps,
  SubAgentDispatcher,
  type TaskRunner,
} from "./dispatcher.js";
export { AgentError } from "./errors.js";
export { type EvidenceCheck, checkEvidence } from "./evidence.js";
export { AgentHandleRegistry } from "./handles.js";
export { storeKnowledgeCards } from "./merge.js";
export {
  AgentRunner,
  type AgentRunnerConfig,
  type AgentRunnerDeps,
} from "./runner.js";
export { type AgentToolContext, SUBMIT_TOOL, agentTools } from "./tools.js";
export type {
  DispatchHandle,
  DispatchOpts,
  DispatchResult,
  DispatchStatus,
  SubAgentTask,
  TaskAssignment,
  TaskError,
  TaskErrorCode,
  TaskStatus,
} from "./types.js";
