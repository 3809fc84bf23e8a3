import type { CheckpointState } from "../../src/core/checkpoints/checkpoint.types";
import type { IdentifiedRecord, RawRecord } from "../../src/core/records/record.types";
import type { CheckpointStore } from "../../src/ports/CheckpointStore";
import type { CrmRecordsClient, FetchPageParams } from "../../src/ports/CrmRecordsClient";
import type { RecordRepository } from "../../src/ports/RecordRepository";

export type ScriptedPage = { ids: Array<string | null>; next: string | null } | Error;

export const rawRecord = (id: string | null): RawRecord => ({
  id,
  properties: { dealname: `Deal ${id ?? "?"}`, amount: "10" },
  associations: {},
  createdAt: null,
  updatedAt: null,
  archived: false
});

/** Answers fetches in order from `pages`; past the end it serves empty pages. */
export const createScriptedClient = (pages: ScriptedPage[]) => {
  const calls: FetchPageParams[] = [];

  const client: CrmRecordsClient = {
    fetchPage: async (params) => {
      const page = pages[calls.length] ?? { ids: [], next: null };
      calls.push(params);
      if (page instanceof Error) throw page;
      return { records: page.ids.map(rawRecord), nextCursor: page.next, rawTotal: null };
    }
  };

  return { client, calls };
};

export const createMemoryRepo = () => {
  const batches: IdentifiedRecord[][] = [];
  const byId = new Map<string, IdentifiedRecord>();

  const repo: RecordRepository = {
    upsertMany: async (records) => {
      batches.push([...records]);
      let upserted = 0;
      let modified = 0;
      for (const record of records) {
        if (byId.has(record.recordId)) modified += 1;
        else upserted += 1;
        byId.set(record.recordId, record);
      }
      return { upserted, modified };
    }
  };

  return { repo, batches, byId };
};

export const createMemoryCheckpointStore = (initial: Record<string, CheckpointState> = {}) => {
  const saved: Array<{ runId: string; state: CheckpointState }> = [];
  const latest = new Map<string, CheckpointState>(Object.entries(initial));

  const checkpoints: CheckpointStore = {
    save: async (runId, state) => {
      saved.push({ runId, state });
      latest.set(runId, state);
    },
    load: async (runId) => latest.get(runId) ?? null
  };

  return { checkpoints, saved, latest };
};
