import { readFileSync } from "node:fs";
import { z } from "zod";
import { PHASES, type Phase, PhaseSchema } from "../schemas/domain.js";

const DEFAULT_POLICY_PATH = new URL(
  "../../config/interview-policy.json",
  import.meta.url,
);

const ToolList = z.array(z.string().min(1));

export const ObjectiveSpecSchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
  })
  .strict();

export const PhaseSpecSchema = z
  .object({
    objectives: z.array(ObjectiveSpecSchema),
    required_objectives: z.array(z.string().min(1)),
    allowed_tools: ToolList,
  })
  .strict();

export const MilestoneSchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
    phase: PhaseSchema,
    objectives: z.array(z.string().min(1)).min(1),
  })
  .strict();

/**
 * Per-phase objective catalog, required objectives and tool sets, plus the
 * tool escapes that stay open while the orchestrator waits on the user.
 */
export const PhasePolicySchema = z
  .object({
    phases: z
      .object({
        core_facts: PhaseSpecSchema,
        deep_dive: PhaseSpecSchema,
        writing_corpus: PhaseSpecSchema,
      })
      .strict(),
    always_available: ToolList.default([]),
    waiting_escapes: z
      .object({
        upload: ToolList.default([]),
        validation: ToolList.default([]),
        approval: ToolList.default([]),
        processing: ToolList.default([]),
      })
      .strict()
      .default({}),
    single_use_tools: ToolList.default([]),
    milestones: z.array(MilestoneSchema).default([]),
  })
  .strict()
  .superRefine((policy, ctx) => {
    for (const phase of PHASES) {
      const spec = policy.phases[phase];
      const catalog = new Set(spec.objectives.map((o) => o.id));
      if (catalog.size !== spec.objectives.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["phases", phase, "objectives"],
          message: "duplicate objective id in catalog",
        });
      }
      for (const id of spec.required_objectives) {
        if (!catalog.has(id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["phases", phase, "required_objectives"],
            message: `required objective "${id}" is not in the ${phase} catalog`,
          });
        }
      }
    }
  });

export type ObjectiveSpec = z.infer<typeof ObjectiveSpecSchema>;
export type PhaseSpec = z.infer<typeof PhaseSpecSchema>;
export type Milestone = z.infer<typeof MilestoneSchema>;
export type PhasePolicy = z.infer<typeof PhasePolicySchema>;

export function definePhasePolicy(input: unknown): PhasePolicy {
  return PhasePolicySchema.parse(input);
}

export function loadPhasePolicy(path: string | URL = DEFAULT_POLICY_PATH): PhasePolicy {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return definePhasePolicy(raw);
}

/** Phase after `phase`, or null when it is the last one. */
export function nextPhase(phase: Phase): Phase | null {
  const index = PHASES.indexOf(phase);
  return PHASES[index + 1] ?? null;
}
