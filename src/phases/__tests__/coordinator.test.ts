import { beforeEach, describe, expect, test } from "vitest";
import { EventBus } from "../../events/bus.js";
import type { EventOf } from "../../events/types.js";
import { ObjectiveLedger } from "../../objectives/ledger.js";
import { testPolicy } from "../../testing/policy.js";
import { PhaseCoordinator } from "../coordinator.js";

describe("PhaseCoordinator", () => {
  let bus: EventBus;
  let ledger: ObjectiveLedger;
  let coordinator: PhaseCoordinator;
  let phaseEvents: EventOf<"phase-changed">[];
  let progressEvents: EventOf<"wizard-progress">[];

  beforeEach(() => {
    bus = new EventBus();
    ledger = new ObjectiveLedger(bus);
    coordinator = new PhaseCoordinator(bus, ledger, testPolicy());
    phaseEvents = [];
    progressEvents = [];
    bus.subscribe("phase-changed", (e) => phaseEvents.push(e));
    bus.subscribe("wizard-progress", (e) => progressEvents.push(e));
    coordinator.start();
  });

  test("start registers the first phase's catalog", () => {
    expect(Object.keys(ledger.statusesForPhase("core_facts"))).toEqual([
      "A",
      "B",
      "C",
      "A.detail",
    ]);
    expect(ledger.statusesForPhase("deep_dive")).toEqual({});
  });

  test("advance succeeds with A, B completed and C skipped", () => {
    ledger.setStatus("A", "completed");
    ledger.setStatus("B", "completed");
    ledger.setStatus("C", "skipped");

    const result = coordinator.advance();

    expect(result).toEqual({ status: "advanced", from: "core_facts", to: "deep_dive" });
    expect(phaseEvents).toEqual([
      { type: "phase-changed", from: "core_facts", to: "deep_dive" },
    ]);
    expect(coordinator.currentPhase).toBe("deep_dive");
    expect(ledger.get("D")?.status).toBe("not_started");
  });

  test("advance is blocked while a required objective is unsettled", () => {
    ledger.setStatus("A", "completed");
    ledger.setStatus("B", "in_progress");

    const result = coordinator.advance();

    expect(result).toEqual({ status: "blocked", phase: "core_facts", missing: ["B", "C"] });
    expect(coordinator.currentPhase).toBe("core_facts");
    expect(phaseEvents).toHaveLength(0);
  });

  test("non-required objectives do not block", () => {
    for (const id of ["A", "B", "C"]) ledger.setStatus(id, "completed");

    expect(ledger.get("A.detail")?.status).toBe("not_started");
    expect(coordinator.advance().status).toBe("advanced");
  });

  test("walks to the terminal state and stays there", () => {
    for (const id of ["A", "B", "C"]) ledger.setStatus(id, "completed");
    coordinator.advance();
    ledger.setStatus("D", "completed");
    coordinator.advance();
    ledger.setStatus("W", "skipped");

    expect(coordinator.advance()).toEqual({
      status: "advanced",
      from: "writing_corpus",
      to: "completed",
    });
    expect(coordinator.advance()).toEqual({ status: "completed" });
    expect(phaseEvents).toHaveLength(3);
  });

  test("progress is recomputed from live statuses on every change", () => {
    expect(progressEvents.at(-1)).toMatchObject({
      completed: [],
      current: "first",
      pending: ["second", "deep"],
    });

    ledger.setStatus("A", "completed");
    expect(progressEvents.at(-1)?.current).toBe("first");

    ledger.setStatus("B", "skipped");
    expect(progressEvents.at(-1)).toMatchObject({
      completed: ["first"],
      current: "second",
      pending: ["deep"],
    });

    ledger.setStatus("B", "in_progress");
    expect(coordinator.progress().completed).toEqual([]);
  });

  test("milestones of passed phases count as completed", () => {
    coordinator.restore("deep_dive");

    expect(coordinator.progress()).toEqual({
      phase: "deep_dive",
      completed: ["first", "second"],
      current: "deep",
      pending: [],
    });
  });

  test("dispose stops progress republishing", () => {
    coordinator.dispose();
    const before = progressEvents.length;

    ledger.setStatus("A", "completed");

    expect(progressEvents).toHaveLength(before);
  });
});
