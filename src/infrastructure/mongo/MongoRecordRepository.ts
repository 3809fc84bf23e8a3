import { randomUUID } from "crypto";
import type { Collection, MongoClient } from "mongodb";
import type { IdentifiedRecord } from "../../core/records/record.types";
import type { RecordRepository, UpsertResult } from "../../ports/RecordRepository";
import { defaultDbName, mongoIndexes } from "./mongo.indexes";

export type RecordDoc = Omit<IdentifiedRecord, "extraction"> & {
  _id: string;
  organizationId: string;
  extraction: IdentifiedRecord["extraction"];
};

const recordKey = (record: IdentifiedRecord) => `${record.extraction.organizationId}\u0000${record.recordId}`;

/**
 * Mongo repository using bulk upsert by `(organizationId, recordId)`.
 */
export const dedupeRecordsById = (records: IdentifiedRecord[]): IdentifiedRecord[] => {
  const byKey = new Map<string, IdentifiedRecord>();
  for (const record of records) {
    // Keep the latest value seen for each id inside the same batch.
    byKey.set(recordKey(record), record);
  }
  return Array.from(byKey.values());
};

export class MongoRecordRepository implements RecordRepository {
  private collection?: Collection<RecordDoc>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = defaultDbName,
    private readonly collectionName = "crm_records"
  ) {}

  private async getCollection(): Promise<Collection<RecordDoc>> {
    if (this.collection) return this.collection;

    const col = this.client.db(this.dbName).collection<RecordDoc>(this.collectionName);

    for (const idx of mongoIndexes.recordCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async upsertMany(records: IdentifiedRecord[]): Promise<UpsertResult> {
    if (records.length === 0) {
      return { upserted: 0, modified: 0 };
    }

    const deduped = dedupeRecordsById(records);
    const col = await this.getCollection();
    const ops = deduped.map(({ recordId, ...fields }) => ({
      updateOne: {
        filter: { organizationId: fields.extraction.organizationId, recordId },
        update: {
          $setOnInsert: {
            _id: randomUUID(),
            organizationId: fields.extraction.organizationId,
            recordId
          },
          $set: fields
        },
        upsert: true
      }
    }));

    const res = await col.bulkWrite(ops, { ordered: false });
    return {
      upserted: res.upsertedCount ?? 0,
      modified: res.modifiedCount ?? 0
    };
  }
}
