import type { EventBus } from "../events/bus.js";
import type { ObjectiveLedger } from "../objectives/ledger.js";
import {
  PHASES,
  type Phase,
  type PhaseState,
  isSettled,
} from "../schemas/domain.js";
import { type PhasePolicy, nextPhase } from "./policy.js";

export type AdvanceResult =
  | { status: "advanced"; from: Phase; to: PhaseState }
  | { status: "blocked"; phase: Phase; missing: string[] }
  | { status: "completed" };

export interface WizardProgress {
  phase: PhaseState;
  completed: string[]; // milestone ids
  current: string | null; // first unsatisfied milestone
  pending: string[]; // unsatisfied milestones after `current`
}

function phaseRank(phase: PhaseState): number {
  return phase === "completed" ? PHASES.length : PHASES.indexOf(phase);
}

/**
 * Top-level interview state machine. Advancement is only ever requested
 * explicitly; the coordinator checks the current phase's required
 * objectives against the ledger and never retries on its own.
 */
export class PhaseCoordinator {
  private phase: PhaseState = PHASES[0];
  private readonly unsubscribe: Array<() => void>;

  constructor(
    private readonly bus: EventBus,
    private readonly ledger: ObjectiveLedger,
    private readonly policy: PhasePolicy,
  ) {
    const republish = () => this.publishProgress();
    this.unsubscribe = [
      bus.subscribe("objective-status-changed", republish),
      bus.subscribe("phase-changed", republish),
    ];
  }

  get currentPhase(): PhaseState {
    return this.phase;
  }

  /** Register the current phase's objective catalog. Safe to call again. */
  start(): void {
    if (this.phase !== "completed") this.registerCatalog(this.phase);
    this.publishProgress();
  }

  /** Resume at a persisted phase. Publishes nothing. */
  restore(phase: PhaseState): void {
    this.phase = phase;
  }

  advance(): AdvanceResult {
    const from = this.phase;
    if (from === "completed") return { status: "completed" };

    const missing = this.ledger.missing(this.policy.phases[from].required_objectives);
    if (missing.length > 0) {
      console.debug(`[phases] advance from ${from} blocked on ${missing.join(", ")}`);
      return { status: "blocked", phase: from, missing };
    }

    const to: PhaseState = nextPhase(from) ?? "completed";
    this.phase = to;
    if (to !== "completed") this.registerCatalog(to);
    console.info(`[phases] ${from} -> ${to}`);
    this.bus.publish({ type: "phase-changed", from, to });
    return { status: "advanced", from, to };
  }

  /** Milestone projection over live ledger statuses. Never stored. */
  progress(): WizardProgress {
    const rank = phaseRank(this.phase);
    const completed: string[] = [];
    const unsatisfied: string[] = [];

    for (const milestone of this.policy.milestones) {
      const passed = PHASES.indexOf(milestone.phase) < rank;
      const settled = milestone.objectives.every((id) =>
        isSettled(this.ledger.get(id)?.status),
      );
      (passed || settled ? completed : unsatisfied).push(milestone.id);
    }

    return {
      phase: this.phase,
      completed,
      current: unsatisfied[0] ?? null,
      pending: unsatisfied.slice(1),
    };
  }

  dispose(): void {
    for (const off of this.unsubscribe) off();
  }

  private registerCatalog(phase: Phase): void {
    for (const spec of this.policy.phases[phase].objectives) {
      if (!this.ledger.has(spec.id)) {
        this.ledger.registerObjective(spec.id, spec.label, phase);
      }
    }
  }

  private publishProgress(): void {
    this.bus.publish({ type: "wizard-progress", ...this.progress() });
  }
}
