import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SqliteArtifactStore } from "../../artifacts/sqlite.js";
import { EventBus } from "../../events/bus.js";
import type { EventOf } from "../../events/types.js";
import { LlmError } from "../../llm/types.js";
import type { KnowledgeCardDraft } from "../../schemas/knowledge-card.js";
import { ScriptedLlm } from "../../testing/scripted-llm.js";
import { type TaskRunner, SubAgentDispatcher } from "../dispatcher.js";
import { AgentError } from "../errors.js";
import { AgentHandleRegistry } from "../handles.js";
import { storeKnowledgeCards } from "../merge.js";
import { AgentRunner } from "../runner.js";
import type { SubAgentTask, TaskAssignment } from "../types.js";

function cardFor(title: string, artifact_id: string): KnowledgeCardDraft {
  return {
    card_type: "project",
    title,
    summary: `Summary of ${title}`,
    claims: [{ statement: title, confidence: 1, evidence: { artifact_id, quote: title } }],
    technologies: [],
    suggested_bullets: [],
  };
}

/** Notes quoting every task title `assignments()` produces. */
const NOTES = Array.from({ length: 6 }, (_, i) => `task ${i + 1}`).join("\n");

function assignments(n: number, artifact_id: string): TaskAssignment[] {
  return Array.from({ length: n }, (_, i) => ({
    title: `task ${i + 1}`,
    instructions: "Write a card.",
    artifact_ids: [artifact_id],
  }));
}

/**
 * Runner whose sessions stay open until the test settles them. `auto`
 * completes every session on the next timer tick.
 */
class FakeRunner implements TaskRunner {
  readonly tool_set = ["get_artifact", "submit_result"];
  readonly started: string[] = [];
  running = 0;
  peak = 0;
  private settle = new Map<string, (outcome: KnowledgeCardDraft | Error) => void>();
  private tasks = new Map<string, SubAgentTask>();

  constructor(private readonly auto = false) {}

  run(task: SubAgentTask, signal: AbortSignal): Promise<KnowledgeCardDraft> {
    const title = task.assignment.title;
    this.started.push(title);
    this.tasks.set(title, task);
    this.running++;
    this.peak = Math.max(this.peak, this.running);

    return new Promise<KnowledgeCardDraft>((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => reject(signal.reason);
      signal.addEventListener("abort", onAbort, { once: true });
      this.settle.set(title, (outcome) => {
        signal.removeEventListener("abort", onAbort);
        if (outcome instanceof Error) reject(outcome);
        else resolve(outcome);
      });
      if (this.auto) setTimeout(() => this.complete(title), 1);
    }).finally(() => {
      this.running--;
    });
  }

  complete(title: string): void {
    const artifact_id = this.tasks.get(title)?.assignment.artifact_ids[0] ?? "";
    this.settle.get(title)?.(cardFor(title, artifact_id));
  }

  completeQuoting(title: string, artifact_id: string): void {
    this.settle.get(title)?.(cardFor(title, artifact_id));
  }

  /** Settle with a card whose claim carries no quote. */
  completeWithoutEvidence(title: string): void {
    const artifact_id = this.tasks.get(title)?.assignment.artifact_ids[0] ?? "";
    const card = cardFor(title, artifact_id);
    this.settle.get(title)?.({
      ...card,
      claims: card.claims.map(({ statement, confidence }) => ({ statement, confidence })),
    });
  }

  fail(title: string, err: Error): void {
    this.settle.get(title)?.(err);
  }
}

describe("SubAgentDispatcher", () => {
  let store: SqliteArtifactStore;
  let notesId: string;
  let bus: EventBus;
  let handles: AgentHandleRegistry;
  let runner: FakeRunner;
  let dispatcher: SubAgentDispatcher;
  let merged: string[];

  const onResult = async (_task: Readonly<SubAgentTask>, card: KnowledgeCardDraft) => {
    merged.push(card.title);
  };

  const tasks = (n: number) => assignments(n, notesId);

  beforeEach(async () => {
    store = new SqliteArtifactStore({ dbPath: ":memory:" });
    const { artifact } = await store.add({
      session_id: "s1",
      source_type: "document",
      filename: "notes.txt",
      content: NOTES,
    });
    notesId = artifact.id;
    bus = new EventBus();
    handles = new AgentHandleRegistry();
    runner = new FakeRunner();
    dispatcher = new SubAgentDispatcher({
      runner,
      store,
      bus,
      handles,
      config: { maxConcurrency: 3, agentTimeoutMs: 60_000 },
    });
    merged = [];
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  test("never runs more tasks than max_concurrency", async () => {
    runner = new FakeRunner(true);
    dispatcher = new SubAgentDispatcher({
      runner,
      store,
      bus,
      handles,
      config: { maxConcurrency: 3, agentTimeoutMs: 60_000 },
    });

    const result = await dispatcher.dispatch(tasks(6), {
      max_concurrency: 2,
      on_result: onResult,
    });

    expect(runner.peak).toBe(2);
    expect(result.status).toBe("succeeded");
    expect(result.succeeded).toHaveLength(6);
    expect(merged).toHaveLength(6);
  });

  test("cancelling after two tasks complete keeps exactly those two results", async () => {
    const handle = dispatcher.start(tasks(5), {
      max_concurrency: 2,
      on_result: onResult,
    });

    await vi.waitFor(() => expect(runner.started).toEqual(["task 1", "task 2"]));
    runner.complete("task 1");
    runner.complete("task 2");
    await vi.waitFor(() =>
      expect(handle.tasks().filter((t) => t.status === "succeeded")).toHaveLength(2),
    );

    handle.cancel("user stopped the run");
    const result = await handle.done;

    expect(result.status).toBe("cancelled");
    expect(result.succeeded.map((s) => s.card.title)).toEqual(["task 1", "task 2"]);
    expect(merged).toEqual(["task 1", "task 2"]);
    expect(runner.peak).toBeLessThanOrEqual(2);

    const rest = result.tasks.slice(2);
    expect(rest.map((t) => t.status)).toEqual(["cancelled", "cancelled", "cancelled"]);
    expect(rest.map((t) => t.result)).toEqual([null, null, null]);
    expect(rest[0]?.error).toEqual({ code: "CANCELLED", message: "user stopped the run" });
    // The fifth task was still queued and never started.
    expect(rest[2]?.started_at).toBeNull();
    expect(runner.started).not.toContain("task 5");
  });

  test("one failing task does not abort its siblings", async () => {
    const handle = dispatcher.start(tasks(3), { on_result: onResult });

    await vi.waitFor(() => expect(runner.started).toHaveLength(3));
    runner.complete("task 1");
    runner.fail("task 2", new AgentError("EVIDENCE_MISSING", "claim 1 has no evidence quote"));
    runner.complete("task 3");
    const result = await handle.done;

    expect(result.status).toBe("partial_failure");
    expect(result.succeeded.map((s) => s.card.title)).toEqual(["task 1", "task 3"]);
    expect(merged).toEqual(["task 1", "task 3"]);
    expect(result.tasks[1]?.status).toBe("failed");
    expect(result.tasks[1]?.error).toEqual({
      code: "EVIDENCE_MISSING",
      message: "claim 1 has no evidence quote",
    });
  });

  test("reports failed when no task succeeds", async () => {
    const handle = dispatcher.start(tasks(1));

    await vi.waitFor(() => expect(runner.started).toHaveLength(1));
    runner.fail("task 1", new LlmError("PROVIDER_ERROR", "upstream 500"));
    const result = await handle.done;

    expect(result.status).toBe("failed");
    expect(result.tasks[0]?.error).toEqual({ code: "LLM_ERROR", message: "upstream 500" });
  });

  test("a failing merge fails the task", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const handle = dispatcher.start(tasks(1), {
      on_result: () => {
        throw new Error("disk full");
      },
    });

    await vi.waitFor(() => expect(runner.started).toHaveLength(1));
    runner.complete("task 1");
    const result = await handle.done;

    expect(result.status).toBe("failed");
    expect(result.succeeded).toEqual([]);
    expect(result.tasks[0]?.error).toEqual({ code: "MERGE_FAILED", message: "disk full" });
  });

  test("kill-agent on the bus cancels a running task", async () => {
    handles.bindBus(bus);
    const handle = dispatcher.start(tasks(2), { max_concurrency: 1, on_result: onResult });

    await vi.waitFor(() => expect(runner.started).toEqual(["task 1"]));
    const [first] = handle.tasks();
    bus.publish({ type: "kill-agent", task_id: first?.task_id ?? "" });

    await vi.waitFor(() => expect(runner.started).toEqual(["task 1", "task 2"]));
    runner.complete("task 2");
    const result = await handle.done;

    expect(result.tasks.map((t) => t.status)).toEqual(["cancelled", "succeeded"]);
    expect(result.tasks[0]?.error?.code).toBe("CANCELLED");
    expect(result.status).toBe("partial_failure");
    expect(merged).toEqual(["task 2"]);
    expect(handles.active()).toEqual([]);
  });

  test("a task killed while queued never starts", async () => {
    const handle = dispatcher.start(tasks(2), { max_concurrency: 1 });
    await vi.waitFor(() => expect(runner.started).toEqual(["task 1"]));

    const second = handle.tasks()[1];
    expect(handles.kill(second?.task_id ?? "")).toBe(true);
    runner.complete("task 1");
    const result = await handle.done;

    expect(runner.started).toEqual(["task 1"]);
    expect(result.tasks.map((t) => t.status)).toEqual(["succeeded", "cancelled"]);
  });

  test("cancelTask only touches unfinished tasks of its dispatch", async () => {
    const handle = dispatcher.start(tasks(2));
    await vi.waitFor(() => expect(runner.started).toHaveLength(2));

    runner.complete("task 1");
    await vi.waitFor(() => expect(handle.tasks()[0]?.status).toBe("succeeded"));
    const [first, second] = handle.tasks();

    expect(handle.cancelTask(first?.task_id ?? "")).toBe(false);
    expect(handle.cancelTask(second?.task_id ?? "")).toBe(true);
    expect(handle.cancelTask("unknown")).toBe(false);
    const result = await handle.done;
    expect(result.tasks.map((t) => t.status)).toEqual(["succeeded", "cancelled"]);
  });

  test("aborting the caller's signal cancels the dispatch", async () => {
    const controller = new AbortController();
    const handle = dispatcher.start(tasks(2), { signal: controller.signal });
    await vi.waitFor(() => expect(runner.started).toHaveLength(2));

    controller.abort();
    const result = await handle.done;

    expect(result.status).toBe("cancelled");
    expect(result.tasks.map((t) => t.status)).toEqual(["cancelled", "cancelled"]);
    expect(dispatcher.activeDispatches).toEqual([]);
  });

  test("a dispatch started on an aborted signal runs nothing", async () => {
    runner = new FakeRunner(true);
    dispatcher = new SubAgentDispatcher({
      runner,
      store,
      bus,
      handles,
      config: { maxConcurrency: 3, agentTimeoutMs: 60_000 },
    });
    const controller = new AbortController();
    controller.abort();

    const result = await dispatcher.dispatch(tasks(3), {
      signal: controller.signal,
      on_result: onResult,
    });

    expect(result.status).toBe("cancelled");
    expect(result.tasks.map((t) => t.status)).toEqual(["cancelled", "cancelled", "cancelled"]);
    expect(result.tasks[0]?.error).toEqual({
      code: "CANCELLED",
      message: "dispatch cancelled by caller",
    });
    expect(runner.started).toEqual([]);
    expect(merged).toEqual([]);
    expect(handles.active()).toEqual([]);
  });

  test("a card without an evidence quote fails its task and is not merged", async () => {
    const handle = dispatcher.start(tasks(2), { on_result: onResult });

    await vi.waitFor(() => expect(runner.started).toHaveLength(2));
    runner.complete("task 1");
    runner.completeWithoutEvidence("task 2");
    const result = await handle.done;

    expect(result.status).toBe("partial_failure");
    expect(merged).toEqual(["task 1"]);
    expect(result.succeeded.map((s) => s.card.title)).toEqual(["task 1"]);
    expect(result.tasks[1]?.status).toBe("failed");
    expect(result.tasks[1]?.result).toBeNull();
    expect(result.tasks[1]?.error).toEqual({
      code: "EVIDENCE_MISSING",
      message: 'claim 1 ("task 2") has no evidence quote',
    });
  });

  test("a card quoting an artifact outside its assignment fails", async () => {
    const { artifact: other } = await store.add({
      session_id: "s1",
      source_type: "document",
      filename: "other.txt",
      content: "task 1",
    });
    const handle = dispatcher.start(tasks(1), { on_result: onResult });

    await vi.waitFor(() => expect(runner.started).toHaveLength(1));
    runner.completeQuoting("task 1", other.id);
    const result = await handle.done;

    expect(result.status).toBe("failed");
    expect(merged).toEqual([]);
    expect(result.tasks[0]?.error).toEqual({
      code: "EVIDENCE_MISSING",
      message: `claim 1 ("task 1") cites artifact ${other.id}, which is not part of this task`,
    });
  });

  test("cancelAll stops every live dispatch", async () => {
    const a = dispatcher.start(tasks(1));
    const b = dispatcher.start(tasks(1));
    expect(dispatcher.activeDispatches).toEqual([a.dispatch_id, b.dispatch_id]);

    expect(dispatcher.cancelAll("session reset")).toEqual([a.dispatch_id, b.dispatch_id]);
    const [ra, rb] = await Promise.all([a.done, b.done]);

    expect(ra.status).toBe("cancelled");
    expect(rb.status).toBe("cancelled");
  });

  test("a task that exceeds its time budget fails with TIMEOUT", async () => {
    dispatcher = new SubAgentDispatcher({
      runner,
      store,
      bus,
      handles,
      config: { maxConcurrency: 1, agentTimeoutMs: 20 },
    });

    const result = await dispatcher.dispatch(tasks(1));

    expect(result.status).toBe("failed");
    expect(result.tasks[0]?.status).toBe("failed");
    expect(result.tasks[0]?.error).toEqual({ code: "TIMEOUT", message: "task exceeded 20ms" });
  });

  test("publishes progress for every task transition", async () => {
    const progress: EventOf<"agent-progress">[] = [];
    bus.subscribe("agent-progress", (e) => progress.push(e));

    const handle = dispatcher.start(tasks(1));
    await vi.waitFor(() => expect(runner.started).toHaveLength(1));
    runner.complete("task 1");
    await handle.done;

    expect(progress.map((e) => e.status)).toEqual(["queued", "running", "succeeded"]);
    expect(progress.every((e) => e.dispatch_id === handle.dispatch_id)).toBe(true);
  });
});

describe("SubAgentDispatcher with AgentRunner", () => {
  let store: SqliteArtifactStore;

  beforeEach(() => {
    store = new SqliteArtifactStore({ dbPath: ":memory:" });
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  test("merges cards with verbatim evidence and drops the rest", async () => {
    const { artifact } = await store.add({
      session_id: "s1",
      source_type: "resume",
      filename: "resume.txt",
      content: "Built the billing API at Initech.",
    });
    const submit = (title: string, quote: string) => ({
      tool_calls: [
        {
          call_id: `c-${title}`,
          name: "submit_result",
          arguments: {
            card_type: "project",
            title,
            summary: "Billing work.",
            claims: [
              {
                statement: "Built the billing API",
                confidence: 0.8,
                evidence: { artifact_id: artifact.id, quote },
              },
            ],
          },
        },
      ],
    });
    const llm = new ScriptedLlm([
      submit("Billing API", "Built the billing API"),
      submit("Invented claim", "Designed the payroll system"),
    ]);
    const bus = new EventBus();
    const dispatcher = new SubAgentDispatcher({
      runner: new AgentRunner({
        llm,
        store,
        bus,
        config: {
          agentMaxTurns: 3,
          maxInvalidSubmissions: 1,
          llmRetries: 0,
          backoff: { baseMs: 0, maxMs: 0, factor: 1, jitter: 0 },
          artifactPageChars: 1000,
        },
      }),
      store,
      bus,
      handles: new AgentHandleRegistry(),
      config: { maxConcurrency: 1, agentTimeoutMs: 60_000 },
    });

    const result = await dispatcher.dispatch(
      [
        { title: "Billing", instructions: "Card for billing.", artifact_ids: [artifact.id] },
        { title: "Payroll", instructions: "Card for payroll.", artifact_ids: [artifact.id] },
      ],
      { on_result: storeKnowledgeCards(store, "s1") },
    );

    expect(result.status).toBe("partial_failure");
    expect(result.tasks[1]?.error?.code).toBe("EVIDENCE_MISSING");

    const cards = await store.list({ session_id: "s1", source_type: "knowledge_card" });
    expect(cards.items).toHaveLength(1);
    expect(cards.items[0]?.filename).toBe("project-billing-api.md");
    expect(cards.items[0]?.metadata.task_id).toBe(result.tasks[0]?.task_id);
  });
});
