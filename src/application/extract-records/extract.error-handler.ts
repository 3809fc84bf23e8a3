import type { CheckpointPhase } from "../../core/checkpoints/checkpoint.types";

export type ExtractSkipCode = "missing_record_id";
export type ExtractFailureCode = "page_fetch_failed" | "repository_write_failed";

export type ExtractErrorContext = {
  pageNumber: number;
  recordsProcessed?: number;
  batchSize?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const statusOf = (reason: unknown): number | undefined => {
  if (!(reason instanceof Error) || !("status" in reason)) return undefined;
  const status = reason.status;
  return typeof status === "number" && Number.isFinite(status) ? status : undefined;
};

export class ExtractionFatalError extends Error {
  readonly code: ExtractFailureCode;
  readonly context: ExtractErrorContext;
  readonly status?: number;
  readonly cause?: unknown;

  constructor(args: { code: ExtractFailureCode; message: string; context: ExtractErrorContext; status?: number; cause?: unknown }) {
    super(args.message);
    this.name = "ExtractionFatalError";
    this.code = args.code;
    this.context = args.context;
    this.status = args.status;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapPageFetchFailure = (reason: unknown, context: ExtractErrorContext) =>
  new ExtractionFatalError({
    code: "page_fetch_failed",
    message: `Page fetch failed at page=${context.pageNumber}: ${toErrorMessage(reason)}`,
    context,
    status: statusOf(reason),
    cause: reason
  });

export const wrapRepositoryFailure = (reason: unknown, context: ExtractErrorContext) =>
  new ExtractionFatalError({
    code: "repository_write_failed",
    message: `Repository write failed at page=${context.pageNumber}: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });

export type ExtractionRunSummary = {
  runId: string;
  phase: CheckpointPhase;
  recordsProcessed: number;
  stored: number;
  upserted: number;
  modified: number;
  skipped: number;
  pagesProcessed: number;
  skippedByCode: Partial<Record<ExtractSkipCode, number>>;
};

export const createExtractionRunSummaryTracker = (runId: string) => {
  let stored = 0;
  let upserted = 0;
  let modified = 0;
  const skippedByCode: Partial<Record<ExtractSkipCode, number>> = {};

  return {
    addStored: (result: { count: number; upserted: number; modified: number }) => {
      stored += result.count;
      upserted += result.upserted;
      modified += result.modified;
    },
    addSkipped: (code: ExtractSkipCode) => {
      skippedByCode[code] = (skippedByCode[code] ?? 0) + 1;
      return skippedByCode[code] ?? 0;
    },
    summary: (progress: { phase: CheckpointPhase; recordsProcessed: number; pagesProcessed: number }): ExtractionRunSummary => ({
      runId,
      phase: progress.phase,
      recordsProcessed: progress.recordsProcessed,
      stored,
      upserted,
      modified,
      skipped: skippedByCode.missing_record_id ?? 0,
      pagesProcessed: progress.pagesProcessed,
      skippedByCode: { ...skippedByCode }
    })
  };
};
