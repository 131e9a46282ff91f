import type { PhasePolicy } from "../phases/policy.js";
import type { PhaseState, WaitingState } from "../schemas/domain.js";
import { ToolError } from "./errors.js";

export type Availability =
  | { allowed: true }
  | { allowed: false; reason: string };

/**
 * Decides which tools the primary agent may call next.
 *
 * Without a waiting state the allowed set is the phase's tools plus the
 * always-available ones. While waiting, the waiting state's escape list is
 * the whole allowed set, whatever the phase. Consumed single-use tools are
 * removed from both.
 */
export class ToolGate {
  private consumed = new Set<string>();
  private readonly singleUse: ReadonlySet<string>;

  constructor(private readonly policy: PhasePolicy) {
    this.singleUse = new Set(policy.single_use_tools);
  }

  allowedTools(phase: PhaseState, waiting: WaitingState | null): ReadonlySet<string> {
    const base =
      waiting !== null
        ? this.policy.waiting_escapes[waiting]
        : [
            ...(phase === "completed" ? [] : this.policy.phases[phase].allowed_tools),
            ...this.policy.always_available,
          ];
    return new Set(base.filter((tool) => !this.consumed.has(tool)));
  }

  availability(
    tool: string,
    phase: PhaseState,
    waiting: WaitingState | null,
  ): Availability {
    if (this.allowedTools(phase, waiting).has(tool)) return { allowed: true };

    if (this.consumed.has(tool)) {
      return { allowed: false, reason: `Tool '${tool}' has already been used` };
    }
    if (waiting !== null) {
      return {
        allowed: false,
        reason: `Tool '${tool}' is not available while waiting for ${waiting}`,
      };
    }
    return {
      allowed: false,
      reason: `Tool '${tool}' is not available in phase ${phase}`,
    };
  }

  assertAllowed(tool: string, phase: PhaseState, waiting: WaitingState | null): void {
    const result = this.availability(tool, phase, waiting);
    if (!result.allowed) {
      throw new ToolError("TOOL_NOT_ALLOWED", result.reason, tool);
    }
  }

  /** Remove a single-use tool from every future allowed set. Returns false for other tools. */
  markConsumed(tool: string): boolean {
    if (!this.singleUse.has(tool)) return false;
    this.consumed.add(tool);
    console.info(`[gate] ${tool} consumed`);
    return true;
  }

  release(tool: string): void {
    this.consumed.delete(tool);
  }

  /** Single-use tools become available again in a new phase. */
  resetConsumed(): void {
    this.consumed.clear();
  }

  consumedTools(): string[] {
    return [...this.consumed];
  }

  restoreConsumed(tools: Iterable<string>): void {
    this.consumed = new Set([...tools].filter((tool) => this.singleUse.has(tool)));
  }
}
