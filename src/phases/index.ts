export {
  type AdvanceResult,
  PhaseCoordinator,
  type WizardProgress,
} from "./coordinator.js";
export {
  definePhasePolicy,
  loadPhasePolicy,
  type Milestone,
  MilestoneSchema,
  nextPhase,
  type ObjectiveSpec,
  type PhasePolicy,
  PhasePolicySchema,
  type PhaseSpec,
} from "./policy.js";
