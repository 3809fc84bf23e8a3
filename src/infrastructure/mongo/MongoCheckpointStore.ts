import type { Collection, MongoClient } from "mongodb";
import { isCheckpointPhase, type CheckpointState } from "../../core/checkpoints/checkpoint.types";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { defaultDbName, mongoIndexes } from "./mongo.indexes";

export type CheckpointDoc = {
  runId: string;
  phase: string;
  recordsProcessed: number;
  cursor: string | null;
  pageNumber: number;
  batchSize: number;
  extra: Record<string, unknown>;
  updatedAt: Date;
};

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads a stored document back into a checkpoint, or null when it does not
 * hold one this code could have written.
 */
export const toCheckpointState = (doc: Record<string, unknown>): CheckpointState | null => {
  const { phase, recordsProcessed, cursor, pageNumber, batchSize, extra } = doc;
  if (!isCheckpointPhase(phase)) return null;
  if (!isNonNegativeInteger(recordsProcessed) || !isNonNegativeInteger(pageNumber)) return null;
  if (!isNonNegativeInteger(batchSize)) return null;
  if (cursor !== null && typeof cursor !== "string") return null;

  return Object.freeze({
    phase,
    recordsProcessed,
    cursor,
    pageNumber,
    batchSize,
    extra: Object.freeze(isRecord(extra) ? { ...extra } : {})
  });
};

/** One document per run, replaced as a whole on every save. */
export class MongoCheckpointStore implements CheckpointStore {
  private collection?: Collection<CheckpointDoc>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = defaultDbName,
    private readonly collectionName = "extraction_checkpoints",
    private readonly now: () => Date = () => new Date()
  ) {}

  private async getCollection(): Promise<Collection<CheckpointDoc>> {
    if (this.collection) return this.collection;

    const col = this.client.db(this.dbName).collection<CheckpointDoc>(this.collectionName);
    for (const idx of mongoIndexes.checkpointCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async save(runId: string, state: CheckpointState): Promise<void> {
    const col = await this.getCollection();
    const doc: CheckpointDoc = {
      runId,
      phase: state.phase,
      recordsProcessed: state.recordsProcessed,
      cursor: state.cursor,
      pageNumber: state.pageNumber,
      batchSize: state.batchSize,
      extra: { ...state.extra },
      updatedAt: this.now()
    };
    await col.replaceOne({ runId }, doc, { upsert: true });
  }

  async load(runId: string): Promise<CheckpointState | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ runId }, { projection: { _id: 0 } });
    return doc ? toCheckpointState(doc) : null;
  }
}
