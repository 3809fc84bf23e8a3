import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export type IndexPlan = ReadonlyArray<{ keys: IndexSpecification; options: CreateIndexesOptions }>;

/**
 * Index plan, applied lazily on first use of each collection:
 * - records: unique { organizationId: 1, recordId: 1 } (upsert key)
 * - records: { "extraction.scanId": 1 } for per-run lookups
 * - checkpoints: unique { runId: 1 }
 */
export const mongoIndexes: { recordCollection: IndexPlan; checkpointCollection: IndexPlan } = {
  recordCollection: [
    { keys: { organizationId: 1, recordId: 1 }, options: { unique: true } },
    { keys: { "extraction.scanId": 1 }, options: {} }
  ],
  checkpointCollection: [
    { keys: { runId: 1 }, options: { unique: true } }
  ]
};

export const defaultDbName = "crm_extract";
