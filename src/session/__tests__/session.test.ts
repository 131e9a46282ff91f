import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { SessionSnapshot } from "../../schemas/session-snapshot.js";
import { SessionError } from "../errors.js";
import { SqliteSessionStore } from "../sqlite.js";
import type { SessionStore, StoredSession } from "../store.js";
import { SessionWriter } from "../writer.js";

function snapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    session_id: "s1",
    phase: "core_facts",
    waiting_state: null,
    continuation: null,
    objectives: [
      {
        id: "applicant_profile",
        label: "Applicant profile",
        phase: "core_facts",
        status: "in_progress",
        parent_id: null,
        source: "llm",
        notes: null,
        completed_at: null,
        updated_at: 1000,
      },
    ],
    artifact_ids: ["a1"],
    pending_operations: [],
    consumed_tools: [],
    approvals: [],
    notes: "",
    messages: [{ role: "user", content: "hello" }],
    updated_at: 1000,
    ...overrides,
  };
}

describe("SqliteSessionStore", () => {
  let store: SqliteSessionStore;

  beforeEach(() => {
    store = new SqliteSessionStore({ dbPath: ":memory:" });
  });

  afterEach(() => {
    store.close();
  });

  test("creates at version 1 and loads the same snapshot back", async () => {
    expect(await store.load("s1")).toBeNull();

    expect(await store.save(snapshot(), 0)).toBe(1);

    expect(await store.load("s1")).toEqual({ snapshot: snapshot(), version: 1 });
  });

  test("updates only at the expected version", async () => {
    await store.save(snapshot(), 0);
    expect(await store.save(snapshot({ notes: "second" }), 1)).toBe(2);

    await expect(store.save(snapshot({ notes: "stale" }), 1)).rejects.toMatchObject({
      code: "VERSION_MISMATCH",
    });
    await expect(store.save(snapshot(), 0)).rejects.toBeInstanceOf(SessionError);
    expect((await store.load("s1"))?.snapshot.notes).toBe("second");
  });

  test("lists most recently updated first and deletes", async () => {
    await store.save(snapshot({ session_id: "old", updated_at: 1 }), 0);
    await store.save(snapshot({ session_id: "new", updated_at: 2 }), 0);

    expect(await store.list()).toEqual([
      { session_id: "new", updated_at: 2 },
      { session_id: "old", updated_at: 1 },
    ]);
    expect(await store.delete("old")).toBe(true);
    expect(await store.delete("old")).toBe(false);
    expect((await store.list()).map((s) => s.session_id)).toEqual(["new"]);
  });
});

describe("SqliteSessionStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sessions-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  test("a corrupted row fails to load with CORRUPT_SNAPSHOT", async () => {
    const dbPath = join(dir, "sessions.db");
    const store = new SqliteSessionStore({ dbPath });
    await store.save(snapshot(), 0);

    const raw = new Database(dbPath);
    raw.prepare("UPDATE sessions SET snapshot_json = ? WHERE session_id = ?").run('{"phase":"nowhere"}', "s1");
    raw.close();

    await expect(store.load("s1")).rejects.toMatchObject({ code: "CORRUPT_SNAPSHOT" });
    expect(console.warn).toHaveBeenCalledTimes(1);
    store.close();
  });
});

describe("SessionWriter", () => {
  let store: SqliteSessionStore;

  beforeEach(() => {
    store = new SqliteSessionStore({ dbPath: ":memory:" });
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  test("refuses to write before init", async () => {
    const writer = new SessionWriter({ store, session_id: "s1" });

    await expect(writer.checkpoint(snapshot())).rejects.toMatchObject({ code: "NOT_INITIALIZED" });
  });

  test("serializes concurrent checkpoints in call order", async () => {
    const writer = new SessionWriter({ store, session_id: "s1" });
    expect(await writer.init()).toBeNull();

    await Promise.all([
      writer.checkpoint(snapshot({ notes: "one" })),
      writer.checkpoint(snapshot({ notes: "two" })),
      writer.checkpoint(snapshot({ notes: "three" })),
    ]);

    expect(writer.currentVersion).toBe(3);
    expect((await store.load("s1"))?.snapshot.notes).toBe("three");
  });

  test("retries once when another writer moved the version", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const a = new SessionWriter({ store, session_id: "s1" });
    await a.init();
    await a.checkpoint(snapshot({ notes: "a1" }));

    const b = new SessionWriter({ store, session_id: "s1" });
    expect((await b.init())?.notes).toBe("a1");
    await b.checkpoint(snapshot({ notes: "b1" }));

    await a.checkpoint(snapshot({ notes: "a2" }));

    expect(a.currentVersion).toBe(3);
    expect((await store.load("s1"))?.snapshot.notes).toBe("a2");
    expect(console.warn).toHaveBeenCalledWith("[session] s1 version moved, retrying once");
  });

  test("fails after a second mismatch without blocking later checkpoints", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    let saves = 0;
    const flaky: SessionStore = {
      load: async (): Promise<StoredSession> => ({ snapshot: snapshot(), version: 4 }),
      save: async (_snapshot, expected_version) => {
        saves++;
        if (saves <= 2) {
          throw new SessionError("VERSION_MISMATCH", "moved", "s1");
        }
        return expected_version + 1;
      },
      list: async () => [],
      delete: async () => false,
    };
    const writer = new SessionWriter({ store: flaky, session_id: "s1" });
    await writer.init();

    await expect(writer.checkpoint(snapshot())).rejects.toMatchObject({
      code: "VERSION_MISMATCH",
      message: "VERSION_MISMATCH after retry for s1",
    });
    await writer.checkpoint(snapshot());

    expect(saves).toBe(3);
    expect(writer.currentVersion).toBe(5);
  });
});
