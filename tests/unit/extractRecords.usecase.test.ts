import { ExtractionFatalError } from "../../src/application/extract-records/extract.error-handler";
import { extractRecords } from "../../src/application/extract-records/extractRecords.usecase";
import type { CheckpointState } from "../../src/core/checkpoints/checkpoint.types";
import type { RecordRepository } from "../../src/ports/RecordRepository";
import { createMemoryCheckpointStore, createMemoryRepo, createScriptedClient } from "../support/fakes";

const fixedNow = () => new Date("2026-03-01T00:00:00.000Z");

const storedCheckpoint = (phase: CheckpointState["phase"]): CheckpointState => ({
  phase,
  recordsProcessed: 250,
  cursor: "abc",
  pageNumber: 3,
  batchSize: 100,
  extra: {}
});

describe("extractRecords", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("stores every record in batches and returns a completed summary", async () => {
    const { client } = createScriptedClient([
      { ids: ["1", "2", "3"], next: "p1" },
      { ids: ["4", "5", "6"], next: "p2" },
      { ids: ["7"], next: null }
    ]);
    const { repo, batches, byId } = createMemoryRepo();
    const { checkpoints, saved } = createMemoryCheckpointStore();

    const summary = await extractRecords(
      { client, repo, checkpoints, now: fixedNow },
      { runId: "run-1", organizationId: "org-1", filters: { batchSize: 2, checkpointInterval: 2 } }
    );

    expect(summary).toEqual({
      runId: "run-1",
      phase: "completed",
      recordsProcessed: 7,
      stored: 7,
      upserted: 7,
      modified: 0,
      skipped: 0,
      pagesProcessed: 3,
      skippedByCode: {}
    });
    expect(byId.size).toBe(7);
    expect(batches.map((batch) => batch.length)).toEqual([2, 2, 2, 1]);
    expect(saved.map(({ state }) => [state.phase, state.cursor])).toEqual([
      ["in_progress", "p2"],
      ["completed", null]
    ]);

    const finished = JSON.parse(String(logSpy.mock.calls[logSpy.mock.calls.length - 1]?.[0]));
    expect(finished).toMatchObject({ event: "extract.finished", runId: "run-1", phase: "completed", stored: 7 });
  });

  it("flushes pending records before a checkpoint is persisted", async () => {
    const { client } = createScriptedClient([
      { ids: ["1", "2", "3"], next: "p1" },
      { ids: ["4"], next: null }
    ]);
    const order: string[] = [];
    const repo: RecordRepository = {
      upsertMany: async (records) => {
        order.push(`upsert:${records.map((record) => record.recordId).join(",")}`);
        return { upserted: records.length, modified: 0 };
      }
    };
    const { checkpoints } = createMemoryCheckpointStore();
    const save = checkpoints.save;
    checkpoints.save = async (runId, state) => {
      order.push(`checkpoint:${state.phase}`);
      await save(runId, state);
    };

    await extractRecords(
      { client, repo, checkpoints, now: fixedNow },
      { runId: "run-1", organizationId: "org-1", filters: { batchSize: 100, checkpointInterval: 1 } }
    );

    expect(order).toEqual([
      "upsert:1,2,3",
      "checkpoint:in_progress",
      "upsert:4",
      "checkpoint:in_progress",
      "checkpoint:completed"
    ]);
  });

  it("skips records without an id and counts them", async () => {
    const { client } = createScriptedClient([{ ids: ["1", null, "3"], next: null }]);
    const { repo, byId } = createMemoryRepo();
    const { checkpoints } = createMemoryCheckpointStore();

    const summary = await extractRecords(
      { client, repo, checkpoints, now: fixedNow },
      { runId: "run-1", organizationId: "org-1" }
    );

    expect([...byId.keys()]).toEqual(["1", "3"]);
    expect(summary.recordsProcessed).toBe(3);
    expect(summary.stored).toBe(2);
    expect(summary.skipped).toBe(1);
    expect(summary.skippedByCode).toEqual({ missing_record_id: 1 });
    expect(JSON.parse(String(warnSpy.mock.calls[0]?.[0]))).toEqual({
      event: "extract.record_skipped",
      reason: "missing record id",
      runId: "run-1",
      pageNumber: 1,
      skippedCount: 1
    });
  });

  it.each(["in_progress", "paused", "paused_mid_page", "error"] as const)(
    "resumes from a stored %s checkpoint",
    async (phase) => {
      const { client, calls } = createScriptedClient([{ ids: ["251"], next: null }]);
      const { repo, byId } = createMemoryRepo();
      const { checkpoints, latest } = createMemoryCheckpointStore({ "run-1": storedCheckpoint(phase) });

      const summary = await extractRecords(
        { client, repo, checkpoints, now: fixedNow },
        { runId: "run-1", organizationId: "org-1", resume: true }
      );

      expect(calls[0]?.cursor).toBe("abc");
      expect(byId.get("251")?.extraction.pageNumber).toBe(4);
      expect(summary).toMatchObject({ phase: "completed", recordsProcessed: 251, pagesProcessed: 4 });
      expect(latest.get("run-1")?.phase).toBe("completed");
    }
  );

  it.each(["completed", "cancelled"] as const)("starts fresh when the stored checkpoint is %s", async (phase) => {
    const { client, calls } = createScriptedClient([{ ids: ["1"], next: null }]);
    const { repo } = createMemoryRepo();
    const { checkpoints } = createMemoryCheckpointStore({ "run-1": storedCheckpoint(phase) });

    const summary = await extractRecords(
      { client, repo, checkpoints, now: fixedNow },
      { runId: "run-1", organizationId: "org-1", resume: true }
    );

    expect(calls[0]?.cursor).toBeNull();
    expect(summary.recordsProcessed).toBe(1);
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({ event: "extract.resume_skipped", runId: "run-1", phase });
  });

  it("ignores stored checkpoints unless resume is requested", async () => {
    const { client, calls } = createScriptedClient([{ ids: ["1"], next: null }]);
    const { repo } = createMemoryRepo();
    const { checkpoints } = createMemoryCheckpointStore({ "run-1": storedCheckpoint("paused") });

    await extractRecords({ client, repo, checkpoints, now: fixedNow }, { runId: "run-1", organizationId: "org-1" });

    expect(calls[0]?.cursor).toBeNull();
  });

  it("reports a paused run and stores every yielded record", async () => {
    const { client } = createScriptedClient([{ ids: ["1", "2", "3", "4", "5"], next: "p1" }]);
    const { repo, byId } = createMemoryRepo();
    const { checkpoints, latest } = createMemoryCheckpointStore();
    // page-level check, then one before each record: the fifth call comes before record 4
    const shouldPause = jest
      .fn()
      .mockReturnValue(true)
      .mockReturnValueOnce(false)
      .mockReturnValueOnce(false)
      .mockReturnValueOnce(false)
      .mockReturnValueOnce(false);

    const summary = await extractRecords(
      { client, repo, checkpoints, now: fixedNow },
      { runId: "run-1", organizationId: "org-1", shouldPause }
    );

    expect(summary).toMatchObject({ phase: "paused_mid_page", recordsProcessed: 3, stored: 3 });
    expect([...byId.keys()]).toEqual(["1", "2", "3"]);
    expect(latest.get("run-1")).toMatchObject({ phase: "paused_mid_page", cursor: null, recordsProcessed: 3 });
  });

  it("wraps repository failures as fatal errors", async () => {
    const { client } = createScriptedClient([{ ids: ["1", "2"], next: null }]);
    const repo: RecordRepository = {
      upsertMany: async () => {
        throw new Error("disk full");
      }
    };
    const { checkpoints, saved } = createMemoryCheckpointStore();

    const failure = extractRecords(
      { client, repo, checkpoints, now: fixedNow },
      { runId: "run-1", organizationId: "org-1", filters: { batchSize: 1 } }
    );

    await expect(failure).rejects.toBeInstanceOf(ExtractionFatalError);
    await expect(failure).rejects.toMatchObject({
      code: "repository_write_failed",
      message: "Repository write failed at page=1: disk full",
      context: { pageNumber: 1, batchSize: 1 }
    });
    expect(saved).toEqual([]);
  });

  it("propagates page fetch failures after the error checkpoint is stored", async () => {
    const { client } = createScriptedClient([{ ids: ["1"], next: "p1" }, new Error("socket hang up")]);
    const { repo, byId } = createMemoryRepo();
    const { checkpoints, latest } = createMemoryCheckpointStore();

    await expect(
      extractRecords({ client, repo, checkpoints, now: fixedNow }, { runId: "run-1", organizationId: "org-1" })
    ).rejects.toMatchObject({ code: "page_fetch_failed" });

    expect(latest.get("run-1")).toMatchObject({ phase: "error", cursor: "p1", recordsProcessed: 1 });
    expect(byId.has("1")).toBe(true);
  });
});
