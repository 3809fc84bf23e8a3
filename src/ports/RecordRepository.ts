import type { IdentifiedRecord } from "../core/records/record.types";

export type UpsertResult = { upserted: number; modified: number };

/**
 * Write side of extracted records. Upserts must be idempotent per
 * `(organizationId, recordId)`: a resumed run may deliver up to one page again.
 */
export interface RecordRepository {
  upsertMany(records: IdentifiedRecord[]): Promise<UpsertResult>;
}
