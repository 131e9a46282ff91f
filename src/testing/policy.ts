import { type PhasePolicy, definePhasePolicy } from "../phases/policy.js";

/**
 * Small policy for unit tests: core_facts requires A, B and C; the other
 * phases require a single objective each.
 */
export function testPolicy(overrides: Record<string, unknown> = {}): PhasePolicy {
  return definePhasePolicy({
    phases: {
      core_facts: {
        objectives: [
          { id: "A", label: "Objective A" },
          { id: "B", label: "Objective B" },
          { id: "C", label: "Objective C" },
          { id: "A.detail", label: "Detail of A" },
        ],
        required_objectives: ["A", "B", "C"],
        allowed_tools: ["get_user_upload", "submit_for_validation"],
      },
      deep_dive: {
        objectives: [{ id: "D", label: "Objective D" }],
        required_objectives: ["D"],
        allowed_tools: ["dispatch_card_agents", "get_user_upload"],
      },
      writing_corpus: {
        objectives: [{ id: "W", label: "Objective W" }],
        required_objectives: ["W"],
        allowed_tools: ["get_user_upload"],
      },
    },
    always_available: ["list_artifacts", "get_artifact", "set_objective_status", "next_phase"],
    waiting_escapes: {
      upload: ["cancel_user_upload"],
      validation: ["update_validation_draft"],
    },
    single_use_tools: ["dispatch_card_agents"],
    milestones: [
      { id: "first", label: "First", phase: "core_facts", objectives: ["A", "B"] },
      { id: "second", label: "Second", phase: "core_facts", objectives: ["C"] },
      { id: "deep", label: "Deep", phase: "deep_dive", objectives: ["D"] },
    ],
    ...overrides,
  });
}
