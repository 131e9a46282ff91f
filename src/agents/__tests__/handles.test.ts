import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { EventBus } from "../../events/bus.js";
import { AgentHandleRegistry } from "../handles.js";

describe("AgentHandleRegistry", () => {
  let registry: AgentHandleRegistry;

  beforeEach(() => {
    registry = new AgentHandleRegistry();
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("kill invokes the handle once and forgets it", () => {
    const kill = vi.fn();
    registry.register("t1", "d1", kill);

    expect(registry.kill("t1", "too slow")).toBe(true);
    expect(registry.kill("t1")).toBe(false);
    expect(kill).toHaveBeenCalledTimes(1);
    expect(kill).toHaveBeenCalledWith("too slow");
    expect(console.warn).toHaveBeenCalledWith("[agents] kill for unknown task t1 ignored");
  });

  test("unregister removes only its own handle", () => {
    const stale = registry.register("t1", "d1", vi.fn());
    registry.register("t1", "d2", vi.fn());
    stale();

    expect(registry.active()).toEqual([{ task_id: "t1", dispatch_id: "d2" }]);
  });

  test("killAll can be scoped to one dispatch", () => {
    registry.register("t1", "d1", vi.fn());
    registry.register("t2", "d2", vi.fn());
    registry.register("t3", "d1", vi.fn());

    expect(registry.killAll("reset", "d1")).toEqual(["t1", "t3"]);
    expect(registry.active()).toEqual([{ task_id: "t2", dispatch_id: "d2" }]);
    expect(registry.killAll("reset")).toEqual(["t2"]);
  });

  test("bindBus routes kill-agent intents until unsubscribed", () => {
    const bus = new EventBus();
    const kill = vi.fn();
    registry.register("t1", "d1", kill);
    const unbind = registry.bindBus(bus);

    bus.publish({ type: "kill-agent", task_id: "t1" });
    expect(kill).toHaveBeenCalledWith("killed by user");

    unbind();
    registry.register("t2", "d1", kill);
    bus.publish({ type: "kill-agent", task_id: "t2" });
    expect(kill).toHaveBeenCalledTimes(1);
  });
});
