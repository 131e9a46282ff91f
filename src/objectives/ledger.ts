import type { EventBus } from "../events/bus.js";
import {
  type ObjectiveStatus,
  type Phase,
  isSettled,
} from "../schemas/domain.js";
import { LedgerError } from "./errors.js";
import type { Objective, SetStatusOpts } from "./types.js";

const OBJECTIVE_ID = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/;

export function parentOf(id: string): string | null {
  const cut = id.lastIndexOf(".");
  return cut === -1 ? null : id.slice(0, cut);
}

/**
 * Hierarchical record of interview objectives.
 *
 * The ledger is the only writer of objective state. Every status change goes
 * through `setStatus`, which publishes `objective-status-changed`. Completing
 * a sub-objective never completes its parent.
 */
export class ObjectiveLedger {
  private objectives = new Map<string, Objective>();
  private writing = false;

  constructor(private readonly bus: EventBus) {}

  registerObjective(
    id: string,
    label: string,
    phase: Phase,
    source = "registration",
  ): Objective {
    return this.write(id, () => {
      if (!OBJECTIVE_ID.test(id)) {
        throw new LedgerError(
          "INVALID_OBJECTIVE_ID",
          `Objective id must be a dot path of non-empty segments: "${id}"`,
          id,
        );
      }
      if (this.objectives.has(id)) {
        throw new LedgerError(
          "DUPLICATE_OBJECTIVE",
          `Objective already registered: ${id}`,
          id,
        );
      }
      const objective: Objective = {
        id,
        label,
        phase,
        status: "not_started",
        parent_id: parentOf(id),
        source,
        notes: null,
        completed_at: null,
        updated_at: Date.now(),
      };
      this.objectives.set(id, objective);
      return Object.freeze({ ...objective });
    });
  }

  /**
   * Transition an objective. Returns the previous status.
   * Unknown ids throw UNKNOWN_OBJECTIVE and leave the ledger unchanged.
   */
  setStatus(
    id: string,
    status: ObjectiveStatus,
    opts: SetStatusOpts = {},
  ): ObjectiveStatus {
    return this.write(id, () => {
      const current = this.objectives.get(id);
      if (!current) {
        throw new LedgerError(
          "UNKNOWN_OBJECTIVE",
          `Unknown objective: ${id}`,
          id,
        );
      }
      const now = Date.now();
      const source = opts.source ?? "llm";
      const next: Objective = {
        ...current,
        status,
        source,
        notes: opts.notes ?? current.notes,
        completed_at: status === "completed" ? now : null,
        updated_at: now,
      };
      this.objectives.set(id, next);

      if (current.status !== status) {
        console.debug(`[ledger] ${id}: ${current.status} -> ${status}`);
      }
      this.bus.publish({
        type: "objective-status-changed",
        objective_id: id,
        phase: current.phase,
        previous: current.status,
        status,
        source,
        ...(opts.notes !== undefined ? { notes: opts.notes } : {}),
      });
      return current.status;
    });
  }

  has(id: string): boolean {
    return this.objectives.has(id);
  }

  get(id: string): Readonly<Objective> | undefined {
    const objective = this.objectives.get(id);
    return objective ? Object.freeze({ ...objective }) : undefined;
  }

  statusesForPhase(phase: Phase): Readonly<Record<string, ObjectiveStatus>> {
    const statuses: Record<string, ObjectiveStatus> = {};
    for (const objective of this.objectives.values()) {
      if (objective.phase === phase) statuses[objective.id] = objective.status;
    }
    return Object.freeze(statuses);
  }

  children(id: string): Readonly<Objective>[] {
    return [...this.objectives.values()]
      .filter((o) => o.parent_id === id)
      .map((o) => Object.freeze({ ...o }));
  }

  /** Ids from `ids` that are not completed or skipped. Unregistered ids count as missing. */
  missing(ids: Iterable<string>): string[] {
    const out: string[] = [];
    for (const id of ids) {
      const objective = this.objectives.get(id);
      if (!objective || !isSettled(objective.status)) out.push(id);
    }
    return out;
  }

  /** One-line status summary for the LLM's context. */
  scratchpad(phase: Phase): string {
    const entries = Object.entries(this.statusesForPhase(phase)).map(
      ([id, status]) => `${id}=${status}`,
    );
    return `objectives[${phase}]: ${entries.length > 0 ? entries.join(", ") : "(none)"}`;
  }

  snapshot(): Readonly<Objective>[] {
    return [...this.objectives.values()].map((o) => Object.freeze({ ...o }));
  }

  /** Replace ledger contents from a persisted snapshot. Publishes nothing. */
  restore(objectives: readonly Objective[]): void {
    this.write("(restore)", () => {
      this.objectives = new Map(
        objectives.map((o) => [o.id, { ...o, parent_id: parentOf(o.id) }]),
      );
    });
  }

  private write<T>(id: string, fn: () => T): T {
    if (this.writing) {
      throw new LedgerError(
        "WRITE_OUTSIDE_DISCIPLINE",
        `Ledger write for ${id} issued while another write is in progress`,
        id,
      );
    }
    this.writing = true;
    try {
      return fn();
    } finally {
      this.writing = false;
    }
  }
}
