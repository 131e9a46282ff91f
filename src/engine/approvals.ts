import { monotonicFactory } from "ulid";
import type { TaskAssignment } from "../agents/types.js";
import type { DispatchApproval } from "../schemas/session-snapshot.js";

export interface CreateApprovalInput {
  call_id: string; // the dispatch_card_agents call that asked for it
  assignments: TaskAssignment[];
}

/**
 * Dispatch requests awaiting the user's go-ahead. Decisions are final: a
 * second decision on the same approval returns the first one unchanged.
 */
export class ApprovalQueue {
  private readonly nextId = monotonicFactory();
  private approvals = new Map<string, DispatchApproval>();

  create(input: CreateApprovalInput): DispatchApproval {
    const approval: DispatchApproval = {
      approval_id: this.nextId(),
      call_id: input.call_id,
      assignments: input.assignments,
      status: "pending",
      requested_at: Date.now(),
      decided_at: null,
      note: null,
    };
    this.approvals.set(approval.approval_id, approval);
    return { ...approval };
  }

  get(approval_id: string): DispatchApproval | undefined {
    const approval = this.approvals.get(approval_id);
    return approval ? { ...approval } : undefined;
  }

  listPending(): DispatchApproval[] {
    return [...this.approvals.values()]
      .filter((a) => a.status === "pending")
      .map((a) => ({ ...a }));
  }

  decide(
    approval_id: string,
    decision: "approve" | "reject",
    note?: string,
  ): DispatchApproval | undefined {
    const current = this.approvals.get(approval_id);
    if (!current) return undefined;
    if (current.status !== "pending") return { ...current };

    const decided: DispatchApproval = {
      ...current,
      status: decision === "approve" ? "approved" : "rejected",
      decided_at: Date.now(),
      note: note ?? null,
    };
    this.approvals.set(approval_id, decided);
    return { ...decided };
  }

  /** Reject everything still pending, e.g. on reset. */
  rejectPending(note: string): DispatchApproval[] {
    return this.listPending().flatMap((a) => this.decide(a.approval_id, "reject", note) ?? []);
  }

  snapshot(): DispatchApproval[] {
    return [...this.approvals.values()].map((a) => ({ ...a }));
  }

  restore(approvals: readonly DispatchApproval[]): void {
    this.approvals = new Map(approvals.map((a) => [a.approval_id, { ...a }]));
  }
}
