import type { MongoClient } from "mongodb";
import type { CheckpointState } from "../../src/core/checkpoints/checkpoint.types";
import {
  MongoCheckpointStore,
  toCheckpointState,
  type CheckpointDoc
} from "../../src/infrastructure/mongo/MongoCheckpointStore";

const state: CheckpointState = {
  phase: "in_progress",
  recordsProcessed: 200,
  cursor: "p2",
  pageNumber: 2,
  batchSize: 100,
  extra: { service: "crm_deals", pagesProcessed: 2 }
};

const doc: CheckpointDoc = {
  runId: "run-1",
  phase: "in_progress",
  recordsProcessed: 200,
  cursor: "p2",
  pageNumber: 2,
  batchSize: 100,
  extra: { service: "crm_deals", pagesProcessed: 2 },
  updatedAt: new Date("2026-03-01T00:00:00.000Z")
};

const createFakeClient = (findOne: jest.Mock = jest.fn().mockResolvedValue(null)) => {
  const createIndex = jest.fn().mockResolvedValue("idx");
  const replaceOne = jest.fn().mockResolvedValue({ acknowledged: true });
  const collection = jest.fn().mockReturnValue({ createIndex, replaceOne, findOne });
  const client = { db: jest.fn().mockReturnValue({ collection }) } as unknown as MongoClient;
  return { client, createIndex, replaceOne, findOne };
};

describe("MongoCheckpointStore", () => {
  it("replaces the run document on save", async () => {
    const { client, createIndex, replaceOne } = createFakeClient();
    const store = new MongoCheckpointStore(client, "crm_test", "checkpoints", () => new Date("2026-03-01T00:00:00.000Z"));

    await store.save("run-1", state);
    await store.save("run-1", { ...state, phase: "completed", cursor: null });

    expect(createIndex).toHaveBeenCalledTimes(1);
    expect(createIndex).toHaveBeenCalledWith({ runId: 1 }, { unique: true });
    expect(replaceOne).toHaveBeenCalledTimes(2);
    expect(replaceOne.mock.calls[0]).toEqual([{ runId: "run-1" }, doc, { upsert: true }]);
    expect(replaceOne.mock.calls[1]?.[1]).toMatchObject({ phase: "completed", cursor: null });
  });

  it("loads a stored checkpoint back", async () => {
    const findOne = jest.fn().mockResolvedValue(doc);
    const { client } = createFakeClient(findOne);

    await expect(new MongoCheckpointStore(client).load("run-1")).resolves.toEqual(state);
    expect(findOne).toHaveBeenCalledWith({ runId: "run-1" }, { projection: { _id: 0 } });
  });

  it("returns null for unknown runs", async () => {
    const { client } = createFakeClient();
    await expect(new MongoCheckpointStore(client).load("missing")).resolves.toBeNull();
  });

  it.each([
    { phase: "running" },
    { recordsProcessed: -1 },
    { pageNumber: 1.5 },
    { batchSize: "100" },
    { cursor: 42 },
    { cursor: undefined }
  ])("rejects a stored document with %j", (patch) => {
    expect(toCheckpointState({ ...doc, ...patch })).toBeNull();
  });
});
