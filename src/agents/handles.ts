import type { EventBus } from "../events/bus.js";

interface AgentHandle {
  task_id: string;
  dispatch_id: string;
  kill(reason: string): void;
}

/**
 * Kill handles for every sub-agent task that has not finished. The UI's
 * "kill agent" affordance reaches tasks through here, queued or running.
 */
export class AgentHandleRegistry {
  private handles = new Map<string, AgentHandle>();

  /** Register a handle; the returned function unregisters it. */
  register(
    task_id: string,
    dispatch_id: string,
    kill: (reason: string) => void,
  ): () => void {
    const handle: AgentHandle = { task_id, dispatch_id, kill };
    this.handles.set(task_id, handle);
    return () => {
      if (this.handles.get(task_id) === handle) this.handles.delete(task_id);
    };
  }

  /** Abort one task. Returns false if no live handle exists for it. */
  kill(task_id: string, reason = "killed by user"): boolean {
    const handle = this.handles.get(task_id);
    if (!handle) {
      console.warn(`[agents] kill for unknown task ${task_id} ignored`);
      return false;
    }
    this.handles.delete(task_id);
    console.info(`[agents] killing ${task_id} (dispatch ${handle.dispatch_id}): ${reason}`);
    handle.kill(reason);
    return true;
  }

  /** Abort every live task, optionally only those of one dispatch. */
  killAll(reason: string, dispatch_id?: string): string[] {
    const killed: string[] = [];
    for (const handle of [...this.handles.values()]) {
      if (dispatch_id !== undefined && handle.dispatch_id !== dispatch_id) continue;
      this.kill(handle.task_id, reason);
      killed.push(handle.task_id);
    }
    return killed;
  }

  active(): Array<{ task_id: string; dispatch_id: string }> {
    return [...this.handles.values()].map(({ task_id, dispatch_id }) => ({ task_id, dispatch_id }));
  }

  /** Route `kill-agent` intents from the bus. Returns the unsubscribe function. */
  bindBus(bus: EventBus): () => void {
    return bus.subscribe("kill-agent", (event) => {
      this.kill(event.task_id);
    });
  }
}
