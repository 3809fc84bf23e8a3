import {
  isResumable,
  toResumePoint,
  type CheckpointState,
  type ResumePoint
} from "../../core/checkpoints/checkpoint.types";
import { hasRecordId, type IdentifiedRecord, type NormalizedRecord } from "../../core/records/record.types";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { CrmRecordsClient } from "../../ports/CrmRecordsClient";
import type { RecordRepository } from "../../ports/RecordRepository";
import { paginateRecords, type RunPredicate } from "./checkpointedPaginator";
import {
  createExtractionRunSummaryTracker,
  wrapRepositoryFailure,
  type ExtractionRunSummary
} from "./extract.error-handler";
import { resolveExtractionFilters, type ExtractionFiltersInput } from "./extractor.config";

export type ExtractRecordsDeps = {
  client: CrmRecordsClient;
  repo: RecordRepository;
  checkpoints: CheckpointStore;
  now?: () => Date;
};

export type ExtractRecordsInput = {
  runId: string;
  organizationId: string;
  filters?: ExtractionFiltersInput;
  resume?: boolean;
  shouldCancel?: RunPredicate;
  shouldPause?: RunPredicate;
  recordUrlBase?: string;
};

const resolveResumePoint = async (
  checkpoints: CheckpointStore,
  runId: string
): Promise<ResumePoint | null> => {
  const stored = await checkpoints.load(runId);
  if (!stored) return null;

  if (!isResumable(stored)) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "extract.resume_skipped", runId, phase: stored.phase }));
    return null;
  }
  return toResumePoint(stored);
};

/**
 * Runs one extraction and stores its records through the repository.
 * Records are upserted in batches; pending records are written before any
 * checkpoint is persisted, so a stored checkpoint never points past stored data.
 */
export const extractRecords = async (
  deps: ExtractRecordsDeps,
  input: ExtractRecordsInput
): Promise<ExtractionRunSummary> => {
  const { client, repo, checkpoints } = deps;
  const { runId } = input;
  const filters = resolveExtractionFilters(input.filters);
  const resumeFrom = input.resume ? await resolveResumePoint(checkpoints, runId) : null;
  const summaryTracker = createExtractionRunSummaryTracker(runId);

  let pending: IdentifiedRecord[] = [];
  const progress: { lastCheckpoint: CheckpointState | null } = { lastCheckpoint: null };
  let currentPage = (resumeFrom?.pageNumber ?? 0) + 1;

  const flush = async () => {
    if (pending.length === 0) return;
    const batch = pending;
    let result: { upserted: number; modified: number };
    try {
      result = await repo.upsertMany(batch);
    } catch (error) {
      throw wrapRepositoryFailure(error, { pageNumber: currentPage, batchSize: batch.length });
    }
    pending = pending.slice(batch.length);
    summaryTracker.addStored({ count: batch.length, ...result });
  };

  const accept = (record: NormalizedRecord) => {
    currentPage = record.extraction.pageNumber;
    if (hasRecordId(record)) {
      pending.push(record);
      return;
    }

    const skippedCount = summaryTracker.addSkipped("missing_record_id");
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "extract.record_skipped",
      reason: "missing record id",
      runId,
      pageNumber: record.extraction.pageNumber,
      skippedCount
    }));
  };

  const records = paginateRecords(
    { client, now: deps.now },
    {
      runId,
      organizationId: input.organizationId,
      filters,
      resumeFrom,
      checkCancel: input.shouldCancel,
      checkPause: input.shouldPause,
      recordUrlBase: input.recordUrlBase,
      onCheckpoint: async (id, state) => {
        progress.lastCheckpoint = state;
        await flush();
        await checkpoints.save(id, state);
      }
    }
  );

  for await (const record of records) {
    accept(record);
    if (pending.length >= filters.batchSize) {
      await flush();
    }
  }
  await flush();

  const finalCheckpoint = progress.lastCheckpoint;
  const summary = summaryTracker.summary({
    phase: finalCheckpoint?.phase ?? "completed",
    recordsProcessed: finalCheckpoint?.recordsProcessed ?? resumeFrom?.recordsProcessed ?? 0,
    pagesProcessed: finalCheckpoint?.pageNumber ?? resumeFrom?.pageNumber ?? 0
  });

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "extract.finished", ...summary }));
  return summary;
};
