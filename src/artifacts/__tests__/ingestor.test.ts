import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { EventBus } from "../../events/bus.js";
import type { EventOf } from "../../events/types.js";
import { ScriptedLlm } from "../../testing/scripted-llm.js";
import { ArtifactIngestor } from "../ingestor.js";
import { SqliteArtifactStore } from "../sqlite.js";
import { ArtifactSummarizer, type SummarizeFn, llmSummarizer } from "../summarizer.js";

describe("ArtifactIngestor", () => {
  let store: SqliteArtifactStore;
  let bus: EventBus;
  let ingested: EventOf<"artifact-ingested">[];

  beforeEach(() => {
    store = new SqliteArtifactStore({ dbPath: ":memory:" });
    bus = new EventBus();
    ingested = [];
    bus.subscribe("artifact-ingested", (e) => ingested.push(e));
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  const encode = (text: string) => new TextEncoder().encode(text);

  test("ingesting the same 50 KB file twice yields one artifact and one summary job", async () => {
    const summarize = vi.fn<SummarizeFn>(async () => "A long document.");
    const summarizer = new ArtifactSummarizer(store, bus, summarize);
    const ingestor = new ArtifactIngestor(store, bus, summarizer);
    const bytes = encode("x".repeat(50 * 1024));

    const first = await ingestor.ingest("s1", "notes.txt", bytes, "document");
    const second = await ingestor.ingest("s1", "notes.txt", bytes, "document");
    await first.summary_job;
    await summarizer.idle();

    expect(second.artifact_id).toBe(first.artifact_id);
    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.summary_job).toBeNull();
    expect(summarize).toHaveBeenCalledTimes(1);
    expect(ingested.map((e) => e.created)).toEqual([true, false]);

    const artifact = await store.get(first.artifact_id);
    expect(artifact?.size_bytes).toBe(51_200);
    expect(artifact?.summary).toBe("A long document.");
  });

  test("ingestion does not wait for summarization", async () => {
    const pending: Array<(summary: string) => void> = [];
    const summarizer = new ArtifactSummarizer(
      store,
      bus,
      () => new Promise<string>((resolve) => {
        pending.push(resolve);
      }),
    );
    const ingestor = new ArtifactIngestor(store, bus, summarizer);

    const first = await ingestor.ingest("s1", "a.txt", encode("alpha"), "document");
    const second = await ingestor.ingest("s1", "b.txt", encode("beta"), "document");

    expect(first.created && second.created).toBe(true);
    expect((await store.get(first.artifact_id))?.summary_status).toBe("pending");

    await vi.waitFor(() => expect(pending).toHaveLength(2));
    for (const resolve of pending) resolve("done");
    await summarizer.idle();
    expect((await store.get(second.artifact_id))?.summary).toBe("done");
  });

  test("summarization failure leaves the artifact usable with a null summary", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const summarizer = new ArtifactSummarizer(store, bus, async () => {
      throw new Error("model overloaded");
    });
    const ingestor = new ArtifactIngestor(store, bus, summarizer);

    const result = await ingestor.ingest("s1", "cv.txt", encode("Jane"), "resume");
    const outcome = await result.summary_job;

    expect(outcome).toEqual({
      artifact_id: result.artifact_id,
      ok: false,
      code: "SUMMARIZATION_FAILED",
      message: "model overloaded",
    });
    const view = (await store.list({ session_id: "s1" })).items[0];
    expect(view?.summary).toBeNull();
    expect(view?.needs_full_fetch).toBe(true);
    expect((await store.get(result.artifact_id))?.raw_text).toBe("Jane");
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test("a custom extractor provides the stored text", async () => {
    const summarizer = new ArtifactSummarizer(store, bus, async () => "s");
    const ingestor = new ArtifactIngestor(store, bus, summarizer, async (_bytes, filename) =>
      `extracted from ${filename}`,
    );

    const result = await ingestor.ingest(null, "scan.pdf", encode("%PDF"), "document");
    await summarizer.idle();

    const artifact = await store.get(result.artifact_id);
    expect(artifact?.raw_text).toBe("extracted from scan.pdf");
    expect(artifact?.size_bytes).toBe(4);
    expect(artifact?.session_id).toBeNull();
  });
});

describe("ArtifactSummarizer", () => {
  test("a store failure while fetching resolves as a failed job", async () => {
    const store = new SqliteArtifactStore({ dbPath: ":memory:" });
    const bus = new EventBus();
    const summarized: EventOf<"artifact-summarized">[] = [];
    bus.subscribe("artifact-summarized", (e) => summarized.push(e));
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const summarize = vi.fn<SummarizeFn>(async () => "never");
    const summarizer = new ArtifactSummarizer(store, bus, summarize);
    const { artifact } = await store.add({
      session_id: "s1",
      source_type: "document",
      filename: "a.txt",
      content: "alpha",
    });
    vi.spyOn(store, "get").mockRejectedValue(new Error("database is locked"));

    const outcome = await summarizer.summarize(artifact.id);

    expect(outcome).toEqual({
      artifact_id: artifact.id,
      ok: false,
      code: "SUMMARIZATION_FAILED",
      message: "database is locked",
    });
    expect(summarize).not.toHaveBeenCalled();
    expect(summarized).toEqual([{ type: "artifact-summarized", artifact_id: artifact.id, ok: false }]);
    expect(summarizer.activeJobs).toBe(0);
    store.close();
    vi.restoreAllMocks();
  });

  test("concurrent requests for one artifact share a job; a later request re-runs", async () => {
    const store = new SqliteArtifactStore({ dbPath: ":memory:" });
    const bus = new EventBus();
    let calls = 0;
    const summarizer = new ArtifactSummarizer(store, bus, async () => {
      calls += 1;
      return `summary ${calls}`;
    });
    const { artifact } = await store.add({
      session_id: "s1",
      source_type: "document",
      filename: "a.txt",
      content: "alpha",
    });

    const [a, b] = await Promise.all([
      summarizer.summarize(artifact.id),
      summarizer.summarize(artifact.id),
    ]);
    const c = await summarizer.summarize(artifact.id);

    expect(a).toBe(b);
    expect(c).toEqual({ artifact_id: artifact.id, ok: true, summary: "summary 2" });
    expect((await store.get(artifact.id))?.summary).toBe("summary 2");
    store.close();
  });

  test("llmSummarizer clips long summaries", async () => {
    const llm = new ScriptedLlm([{ text: "  abcdefghij  " }]);
    const summarize = llmSummarizer(llm, { maxChars: 5 });
    const store = new SqliteArtifactStore({ dbPath: ":memory:" });
    const { artifact } = await store.add({
      session_id: "s1",
      source_type: "document",
      filename: "a.txt",
      content: "alpha",
    });

    expect(await summarize(artifact)).toBe("abcd…");
    expect(llm.requests[0]?.tool_choice).toBe("none");
    store.close();
  });
});
