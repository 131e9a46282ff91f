import { SubAgentDispatcher, type TaskRunner } from "../agents/dispatcher.js";
import { AgentHandleRegistry } from "../agents/handles.js";
import { storeKnowledgeCards } from "../agents/merge.js";
import { AgentRunner } from "../agents/runner.js";
import type { DispatchResult, TaskAssignment } from "../agents/types.js";
import type { ArtifactStore } from "../artifacts/store.js";
import type { EngineConfig } from "../config/config.js";
import type { EventBus } from "../events/bus.js";
import type { EventOf } from "../events/types.js";
import { completeWithRetry } from "../llm/retry.js";
import { type ChatMessage, type LlmClient, LlmError, type ToolCall } from "../llm/types.js";
import { ObjectiveLedger } from "../objectives/ledger.js";
import { OperationTracker, cancelledOutput } from "../operations/tracker.js";
import { PhaseCoordinator } from "../phases/coordinator.js";
import type { PhasePolicy } from "../phases/policy.js";
import type { WaitingState } from "../schemas/domain.js";
import type { Continuation, SessionSnapshot } from "../schemas/session-snapshot.js";
import { type ToolOutcome, ToolOutcomeSchema } from "../schemas/tool-result.js";
import type { SessionStore } from "../session/store.js";
import { SessionWriter } from "../session/writer.js";
import type { ToolRegistry } from "../tools/define.js";
import { toToolErrorPayload } from "../tools/errors.js";
import { ToolGate } from "../tools/gate.js";
import { ApprovalQueue } from "./approvals.js";
import { EngineError, isFatal } from "./errors.js";
import { Inbox } from "./inbox.js";
import { primaryTools } from "./primary-tools.js";
import type {
  ConversationHost,
  InboundMessage,
  InterruptResult,
  PrimaryToolContext,
  ResyncEntry,
  StepOutcome,
  Turn,
} from "./types.js";

export const DISPATCH_TOOL = "dispatch_card_agents";

const DEFAULT_SYSTEM_PROMPT =
  "You are conducting a structured interview. Use the tools to record progress on objectives, " +
  "request documents and advance phases. Reply without tool calls when you need the user's answer.";

export interface OrchestratorDeps {
  session_id: string;
  llm: LlmClient;
  bus: EventBus;
  store: ArtifactStore;
  sessions: SessionStore;
  policy: PhasePolicy;
  config: EngineConfig;
  system_prompt?: string;
  /** Sub-agent runner; defaults to an AgentRunner on the same LLM. */
  runner?: TaskRunner;
}

function note(payload: Record<string, unknown>): ChatMessage {
  return { role: "user", content: JSON.stringify(payload) };
}

function succeeded(output: string): boolean {
  try {
    const parsed = ToolOutcomeSchema.safeParse(JSON.parse(output));
    return parsed.success && parsed.data.ok;
  } catch {
    return false;
  }
}

function reasonOf(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

function summarizeDispatch(result: DispatchResult): Record<string, unknown> {
  return {
    dispatch_id: result.dispatch_id,
    status: result.status,
    cards: result.succeeded.map(({ task_id, card }) => ({
      task_id,
      card_type: card.card_type,
      title: card.title,
    })),
    failures: result.tasks.flatMap((task) =>
      task.error ? [{ task_id: task.task_id, title: task.assignment.title, ...task.error }] : [],
    ),
  };
}

/**
 * Drives the single primary conversation. Inbound messages are consumed
 * one at a time; each step runs LLM turns until the model hands the turn
 * back to the user, the conversation pauses on a continuation, the phase
 * advances or the round limit is reached. All ledger and phase writes
 * happen on this loop.
 */
export class PrimaryOrchestrator implements ConversationHost {
  readonly session_id: string;
  readonly store: ArtifactStore;
  readonly bus: EventBus;
  readonly config: EngineConfig;
  readonly ledger: ObjectiveLedger;
  readonly coordinator: PhaseCoordinator;
  readonly gate: ToolGate;
  readonly tracker = new OperationTracker();
  readonly approvals = new ApprovalQueue();
  readonly handles = new AgentHandleRegistry();
  readonly dispatcher: SubAgentDispatcher;

  private readonly llm: LlmClient;
  private readonly writer: SessionWriter;
  private readonly tools: ToolRegistry<PrimaryToolContext> = primaryTools();
  private readonly inbox = new Inbox<InboundMessage>();
  private readonly systemPrompt: string;
  private unsubscribe: Array<() => void> = [];

  private messages: ChatMessage[] = [];
  private pending: Continuation | null = null;
  private dossier = "";
  private started = false;
  private turnController: AbortController | null = null;
  private active: Promise<StepOutcome> | null = null;

  constructor(deps: OrchestratorDeps) {
    this.session_id = deps.session_id;
    this.store = deps.store;
    this.bus = deps.bus;
    this.config = deps.config;
    this.llm = deps.llm;
    this.systemPrompt = deps.system_prompt ?? DEFAULT_SYSTEM_PROMPT;
    this.ledger = new ObjectiveLedger(deps.bus);
    this.coordinator = new PhaseCoordinator(deps.bus, this.ledger, deps.policy);
    this.gate = new ToolGate(deps.policy);
    this.writer = new SessionWriter({ store: deps.sessions, session_id: deps.session_id });
    this.dispatcher = new SubAgentDispatcher({
      runner:
        deps.runner ??
        new AgentRunner({ llm: deps.llm, store: deps.store, bus: deps.bus, config: deps.config }),
      store: deps.store,
      bus: deps.bus,
      handles: this.handles,
      config: deps.config,
    });
  }

  // Lifecycle

  /**
   * Resume the stored session, or start a new one at the first phase.
   * A new session queues a `phase-started` message for `run()`.
   */
  async start(): Promise<"restored" | "created"> {
    if (this.started) throw new EngineError("ALREADY_RUNNING", "Orchestrator already started");

    const stored = await this.writer.init();
    this.bindBus();
    this.started = true;

    if (stored) {
      this.restore(stored);
      const answered = this.resynchronize();
      await this.checkpoint();
      console.info(
        `[orchestrator] ${this.session_id} restored at ${stored.phase} (${answered.length} dangling call(s) answered)`,
      );
      return "restored";
    }

    this.coordinator.start();
    await this.checkpoint();
    const phase = this.coordinator.currentPhase;
    if (phase !== "completed") this.inbox.push({ type: "phase-started", phase });
    console.info(`[orchestrator] ${this.session_id} started at ${phase}`);
    return "created";
  }

  /** Queue a message for `run()`. */
  enqueue(message: InboundMessage): void {
    this.inbox.push(message);
  }

  /**
   * Consume the inbox until it is closed or `signal` aborts. Aborting only
   * stops the wait for the next message; use `interrupt()` to cut a step
   * short.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (true) {
      let message: InboundMessage;
      try {
        message = await this.inbox.next(signal);
      } catch (err) {
        if (signal?.aborted) return;
        if (err instanceof EngineError && err.code === "INBOX_CLOSED") return;
        throw err;
      }
      const outcome = await this.step(message);
      if (outcome.kind === "phase_advanced" && outcome.to !== "completed") {
        this.inbox.push({ type: "phase-started", phase: outcome.to });
      }
    }
  }

  async stop(): Promise<void> {
    this.inbox.close();
    for (const off of this.unsubscribe) off();
    this.unsubscribe = [];
    this.dispatcher.cancelAll("orchestrator stopped");
    this.coordinator.dispose();
    await this.writer.flush();
  }

  get waitingState(): WaitingState | null {
    return this.pending?.kind ?? null;
  }

  get history(): readonly ChatMessage[] {
    return this.messages;
  }

  get isRunning(): boolean {
    return this.active !== null;
  }

  // Conversation loop

  /** Process one inbound message. Only one step runs at a time. */
  async step(message: InboundMessage): Promise<StepOutcome> {
    if (!this.started) {
      throw new EngineError("NOT_STARTED", "step() called before start()", {
        session_id: this.session_id,
      });
    }
    if (this.active) {
      throw new EngineError("ALREADY_RUNNING", "A step is already in progress", {
        session_id: this.session_id,
      });
    }

    const controller = new AbortController();
    this.turnController = controller;
    const run = this.runStep(message, controller.signal);
    this.active = run;
    try {
      return await run;
    } finally {
      this.active = null;
      this.turnController = null;
    }
  }

  private async runStep(message: InboundMessage, signal: AbortSignal): Promise<StepOutcome> {
    try {
      const ignored = await this.accept(message, signal);
      if (ignored) return ignored;
      return await this.runTurns(signal);
    } catch (err) {
      if (signal.aborted && !isFatal(err)) {
        return { kind: "interrupted", reason: reasonOf(signal.reason) };
      }
      throw err;
    }
  }

  /** Append what the message tells the model. Returns an outcome when there is nothing to run. */
  private async accept(message: InboundMessage, signal: AbortSignal): Promise<StepOutcome | null> {
    switch (message.type) {
      case "user-message":
        this.messages.push({ role: "user", content: message.text });
        return null;

      case "phase-started":
        this.messages.push(
          note({
            event: "phase_started",
            phase: message.phase,
            objectives: this.ledger.statusesForPhase(message.phase),
          }),
        );
        return null;

      case "retry-requested":
        return null;

      case "upload-completed": {
        const pending = this.pending;
        if (pending?.kind !== "upload" || pending.upload_id !== message.upload_id) {
          return this.ignore(`no pending upload ${message.upload_id}`);
        }
        this.clearWaiting();
        this.messages.push(
          note({
            event: "upload_completed",
            upload_id: pending.upload_id,
            title: pending.title,
            objective_id: pending.objective_id,
            artifact_ids: message.artifact_ids,
          }),
        );
        return null;
      }

      case "upload-cancelled": {
        const pending = this.pending;
        if (pending?.kind !== "upload" || pending.upload_id !== message.upload_id) {
          return this.ignore(`no pending upload ${message.upload_id}`);
        }
        this.clearWaiting();
        this.messages.push(
          note({
            event: "upload_cancelled",
            upload_id: pending.upload_id,
            reason: message.reason ?? null,
          }),
        );
        return null;
      }

      case "validation-submitted": {
        const pending = this.pending;
        if (pending?.kind !== "validation" || pending.validation_id !== message.validation_id) {
          return this.ignore(`no pending validation ${message.validation_id}`);
        }
        this.clearWaiting();
        if (pending.objective_id && message.decision !== "rejected") {
          this.ledger.setStatus(pending.objective_id, "completed", {
            source: "validation",
            notes: message.notes,
          });
        }
        this.messages.push(
          note({
            event: "validation_submitted",
            validation_id: pending.validation_id,
            decision: message.decision,
            changes: message.changes ?? null,
            notes: message.notes ?? null,
          }),
        );
        return null;
      }

      case "dispatch-approved": {
        const pending = this.pending;
        if (pending?.kind !== "approval" || pending.approval_id !== message.approval_id) {
          return this.ignore(`no pending approval ${message.approval_id}`);
        }
        const approval = this.approvals.decide(message.approval_id, "approve");
        if (!approval) return this.ignore(`unknown approval ${message.approval_id}`);

        this.enterWaiting({ kind: "processing", approval_id: approval.approval_id });
        await this.checkpoint();
        const result = await this.runDispatch(approval.assignments, signal);
        this.clearWaiting();
        this.messages.push(
          note({ event: "dispatch_completed", approval_id: approval.approval_id, ...summarizeDispatch(result) }),
        );
        return null;
      }

      case "dispatch-rejected": {
        const pending = this.pending;
        if (pending?.kind !== "approval" || pending.approval_id !== message.approval_id) {
          return this.ignore(`no pending approval ${message.approval_id}`);
        }
        this.approvals.decide(message.approval_id, "reject", message.reason);
        this.gate.release(DISPATCH_TOOL);
        this.clearWaiting();
        this.messages.push(
          note({
            event: "dispatch_rejected",
            approval_id: message.approval_id,
            reason: message.reason ?? null,
          }),
        );
        return null;
      }
    }
  }

  private ignore(reason: string): StepOutcome {
    console.warn(`[orchestrator] ${this.session_id}: ignoring continuation, ${reason}`);
    return { kind: "ignored", reason };
  }

  private async runTurns(signal: AbortSignal): Promise<StepOutcome> {
    const rounds = this.config.maxToolRoundsPerStep;

    for (let round = 0; round < rounds; round++) {
      let turn: Turn;
      try {
        turn = await this.nextTurn(signal);
      } catch (err) {
        if (signal.aborted || !(err instanceof LlmError)) throw err;
        // Everything captured so far is durable before the user sees the error.
        await this.checkpoint();
        console.error(`[orchestrator] ${this.session_id} LLM call failed:`, err.message);
        this.bus.publish({ type: "conversation-error", message: err.message, retryable: true });
        return { kind: "error", message: err.message, retryable: true };
      }
      signal.throwIfAborted();

      if (turn.tool_calls.length === 0) {
        this.messages.push({ role: "assistant", content: turn.text });
        await this.checkpoint();
        return { kind: "awaiting_user", text: turn.text };
      }

      this.messages.push({ role: "assistant", content: turn.text, tool_calls: turn.tool_calls });
      await this.checkpoint();

      const before = this.coordinator.currentPhase;
      for (const call of turn.tool_calls) {
        const output = await this.execute(call, signal);
        signal.throwIfAborted();
        this.messages.push({ role: "tool", call_id: call.call_id, content: output });
        await this.checkpoint();
      }
      for (const call of turn.tool_calls) this.tracker.cleanup(call.call_id);
      await this.checkpoint();

      if (this.pending) return { kind: "waiting", state: this.pending.kind };
      const after = this.coordinator.currentPhase;
      if (before !== "completed" && after !== before) {
        return { kind: "phase_advanced", from: before, to: after };
      }
    }

    console.warn(`[orchestrator] ${this.session_id} hit the round limit (${rounds})`);
    return { kind: "round_limit", rounds };
  }

  /** One LLM turn over the full history, offering only the tools the gate allows. */
  async nextTurn(signal: AbortSignal): Promise<Turn> {
    const allowed = this.gate.allowedTools(this.coordinator.currentPhase, this.waitingState);
    const tools = this.tools.definitions(allowed);
    const response = await completeWithRetry(
      this.llm,
      {
        messages: [{ role: "system", content: this.context() }, ...this.messages],
        tools,
        tool_choice: tools.length > 0 ? "auto" : "none",
      },
      {
        retries: this.config.llmRetries,
        backoff: this.config.backoff,
        signal,
        onRetry: (err, attempt) => {
          console.warn(`[orchestrator] ${this.session_id} retry ${attempt} after:`, reasonOf(err));
        },
      },
    );
    this.bus.publish({
      type: "token-usage",
      source: "primary",
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
    });
    return { tool_calls: response.tool_calls, text: response.text };
  }

  private context(): string {
    const phase = this.coordinator.currentPhase;
    const lines = [
      this.systemPrompt,
      "",
      `phase: ${phase}`,
      `waiting: ${this.waitingState ?? "none"}`,
      phase === "completed" ? "objectives: (interview complete)" : this.ledger.scratchpad(phase),
    ];
    if (this.dossier !== "") lines.push("", "## Dossier notes", this.dossier);
    return lines.join("\n");
  }

  /** Gate, track and run one tool call. Returns the tool message content. */
  private async execute(call: ToolCall, signal: AbortSignal): Promise<string> {
    const availability = this.gate.availability(
      call.name,
      this.coordinator.currentPhase,
      this.waitingState,
    );
    if (!availability.allowed) {
      console.debug(`[orchestrator] refused ${call.name}: ${availability.reason}`);
      return this.reply(call, { ok: false, error: { kind: "tool_not_allowed", message: availability.reason } });
    }

    const known = this.tracker.result(call.call_id);
    if (known !== undefined) {
      console.info(`[orchestrator] replaying ${call.name} ${call.call_id}`);
      this.publishResult(call, known, true);
      return known;
    }

    const tool = this.tools.get(call.name);
    if (!tool) {
      return this.reply(call, {
        ok: false,
        error: { kind: "unknown_tool", message: `No tool named '${call.name}'` },
      });
    }

    this.tracker.register({ call_id: call.call_id, tool: call.name, arguments: call.arguments });
    try {
      const data = await tool.invoke(call.arguments, { host: this, call_id: call.call_id, signal });
      this.tracker.complete(call.call_id, JSON.stringify({ ok: true, data }));
    } catch (err) {
      const error = toToolErrorPayload(err);
      this.tracker.fail(call.call_id, err, JSON.stringify({ ok: false, error }));
    }

    // The tracker's output wins: an interrupt may have cancelled the call meanwhile.
    const output = this.tracker.result(call.call_id) ?? cancelledOutput("no result recorded");
    this.publishResult(call, output, false);
    return output;
  }

  private reply(call: ToolCall, outcome: ToolOutcome): string {
    const output = JSON.stringify(outcome);
    this.publishResult(call, output, false);
    return output;
  }

  private publishResult(call: ToolCall, output: string, replayed: boolean): void {
    this.bus.publish({
      type: "tool-result",
      call_id: call.call_id,
      tool: call.name,
      ok: succeeded(output),
      replayed,
    });
  }

  // ConversationHost

  continuation(): Continuation | null {
    return this.pending;
  }

  enterWaiting(continuation: Continuation): void {
    const previous = this.waitingState;
    this.pending = continuation;
    if (previous !== continuation.kind) {
      this.bus.publish({ type: "waiting-state-changed", previous, current: continuation.kind });
    }
  }

  clearWaiting(): Continuation | null {
    const previous = this.pending;
    this.pending = null;
    if (previous) {
      this.bus.publish({ type: "waiting-state-changed", previous: previous.kind, current: null });
    }
    return previous;
  }

  notes(): string {
    return this.dossier;
  }

  setNotes(notes: string): void {
    this.dossier = notes;
  }

  /**
   * With approval required, park the assignments until the user decides;
   * otherwise run the dispatch inside the tool call.
   */
  async requestDispatch(
    call_id: string,
    assignments: TaskAssignment[],
    signal: AbortSignal,
  ): Promise<Record<string, unknown>> {
    this.gate.markConsumed(DISPATCH_TOOL);

    if (this.config.requireDispatchApproval) {
      const approval = this.approvals.create({ call_id, assignments });
      this.enterWaiting({ kind: "approval", approval_id: approval.approval_id });
      this.bus.publish({
        type: "dispatch-approval-requested",
        approval_id: approval.approval_id,
        assignments: assignments.length,
        titles: assignments.map((a) => a.title),
      });
      return { status: "awaiting_approval", approval_id: approval.approval_id, tasks: assignments.length };
    }

    return summarizeDispatch(await this.runDispatch(assignments, signal));
  }

  /** A dispatch that produced no cards leaves the tool available for another attempt. */
  private async runDispatch(assignments: TaskAssignment[], signal: AbortSignal): Promise<DispatchResult> {
    // An interrupt may land while the caller was checkpointing; start nothing after it.
    signal.throwIfAborted();
    const result = await this.dispatcher.dispatch(assignments, {
      signal,
      on_result: storeKnowledgeCards(this.store, this.session_id),
    });
    if (result.succeeded.length === 0) this.gate.release(DISPATCH_TOOL);
    return result;
  }

  // Interruption and recovery

  /**
   * Cut the current step short: abort its LLM call, cancel open operations
   * and running dispatches, reject pending approvals and leave any waiting
   * state. Dangling tool calls are answered before the checkpoint.
   */
  async interrupt(reason = "interrupted by user"): Promise<InterruptResult> {
    this.turnController?.abort(new EngineError("INTERRUPTED", reason));

    const cancelled_operations = this.tracker.cancelAll(reason);
    const cancelled_dispatches = this.dispatcher.cancelAll(reason);
    const rejected = this.approvals.rejectPending(reason);
    const cleared = this.clearWaiting();

    if (this.active) await Promise.allSettled([this.active]);
    if (cancelled_dispatches.length > 0 || rejected.length > 0 || cleared?.kind === "processing") {
      this.gate.release(DISPATCH_TOOL);
    }
    this.resynchronize();
    await this.checkpoint();

    console.info(
      `[orchestrator] ${this.session_id} interrupted (${reason}): ${cancelled_operations.length} operation(s), ${cancelled_dispatches.length} dispatch(es)`,
    );
    return {
      cancelled_operations,
      cancelled_dispatches,
      cleared_waiting: cleared?.kind ?? null,
    };
  }

  /**
   * Give every assistant tool call without a tool message an answer: the
   * tracker's terminal output when it has one, otherwise a cancellation.
   * Nothing is re-invoked.
   */
  resynchronize(): ResyncEntry[] {
    const entries: ResyncEntry[] = [];
    const out: ChatMessage[] = [];
    let i = 0;

    while (i < this.messages.length) {
      const message = this.messages[i];
      i++;
      if (message === undefined) break;
      out.push(message);
      if (message.role !== "assistant" || !message.tool_calls) continue;

      const answered = new Set<string>();
      let next = this.messages[i];
      while (next?.role === "tool") {
        answered.add(next.call_id);
        out.push(next);
        i++;
        next = this.messages[i];
      }

      for (const call of message.tool_calls) {
        if (answered.has(call.call_id)) continue;
        const entry = this.answerDangling(call);
        out.push({ role: "tool", call_id: call.call_id, content: entry.output });
        entries.push({ call_id: call.call_id, replayed: entry.replayed });
      }
    }

    if (entries.length > 0) {
      this.messages = out;
      for (const entry of entries) this.tracker.cleanup(entry.call_id);
      console.info(`[orchestrator] ${this.session_id} answered ${entries.length} dangling call(s)`);
    }
    return entries;
  }

  private answerDangling(call: ToolCall): { output: string; replayed: boolean } {
    const known = this.tracker.result(call.call_id);
    if (known !== undefined) {
      this.publishResult(call, known, true);
      return { output: known, replayed: true };
    }
    const reason = "interrupted before completion";
    if (this.tracker.get(call.call_id)) this.tracker.cancel(call.call_id, reason);
    const output = this.tracker.result(call.call_id) ?? cancelledOutput(reason);
    this.publishResult(call, output, false);
    return { output, replayed: false };
  }

  // Persistence

  async snapshot(): Promise<SessionSnapshot> {
    return {
      session_id: this.session_id,
      phase: this.coordinator.currentPhase,
      waiting_state: this.waitingState,
      continuation: this.pending,
      objectives: this.ledger.snapshot().map((o) => ({ ...o })),
      artifact_ids: await this.store.listSessionIds(this.session_id),
      pending_operations: this.tracker.snapshot().map((o) => ({ ...o })),
      consumed_tools: this.gate.consumedTools(),
      approvals: this.approvals.snapshot(),
      notes: this.dossier,
      messages: this.messages.map((m) => ({ ...m })),
      updated_at: Date.now(),
    };
  }

  async checkpoint(): Promise<void> {
    await this.writer.checkpoint(await this.snapshot());
  }

  private restore(snapshot: SessionSnapshot): void {
    this.coordinator.restore(snapshot.phase);
    this.ledger.restore(snapshot.objectives);
    this.tracker.restore(snapshot.pending_operations);
    this.gate.restoreConsumed(snapshot.consumed_tools);
    this.approvals.restore(snapshot.approvals);
    this.dossier = snapshot.notes;
    this.messages = [...snapshot.messages];
    this.pending = snapshot.continuation;

    // A dispatch cannot outlive its process; the model hears that it stopped.
    if (this.pending?.kind === "processing") {
      const { approval_id } = this.pending;
      this.pending = null;
      this.gate.release(DISPATCH_TOOL);
      this.messages.push(note({ event: "dispatch_interrupted", approval_id }));
      console.warn(`[orchestrator] ${this.session_id} dispatch for ${approval_id} was interrupted`);
    }
  }

  private bindBus(): void {
    const forward = (event: InboundMessage) => {
      if (!this.inbox.isClosed) this.inbox.push(event);
    };
    const onReset = (event: EventOf<"reset-requested">) => {
      this.interrupt(event.reason ?? "reset requested").catch((err: unknown) => {
        console.error(`[orchestrator] ${this.session_id} interrupt failed:`, err);
      });
    };
    this.unsubscribe = [
      this.bus.subscribe("user-message", forward),
      this.bus.subscribe("upload-completed", forward),
      this.bus.subscribe("upload-cancelled", forward),
      this.bus.subscribe("validation-submitted", forward),
      this.bus.subscribe("dispatch-approved", forward),
      this.bus.subscribe("dispatch-rejected", forward),
      this.bus.subscribe("retry-requested", forward),
      this.bus.subscribe("reset-requested", onReset),
      this.bus.subscribe("phase-changed", () => this.gate.resetConsumed()),
      this.handles.bindBus(this.bus),
    ];
  }
}
