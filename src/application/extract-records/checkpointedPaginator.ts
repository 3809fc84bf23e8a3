import type { CheckpointPhase, ResumePoint } from "../../core/checkpoints/checkpoint.types";
import type { NormalizedRecord, RawRecord } from "../../core/records/record.types";
import { defaultSourceService, transformRecord, type TransformContext } from "../../core/records/transformRecord";
import type { CrmRecordsClient, PageResult } from "../../ports/CrmRecordsClient";
import { buildCheckpoint, saveCheckpoint, type CheckpointCallback } from "./checkpoint";
import { toErrorMessage, wrapPageFetchFailure } from "./extract.error-handler";
import { associationsFor, crmBatchSizeLimit, type ExtractionFilters } from "./extractor.config";

export type RunPredicate = (runId: string) => boolean | Promise<boolean>;

export type PaginatorDeps = {
  client: CrmRecordsClient;
  transform?: (raw: RawRecord, context: TransformContext) => NormalizedRecord;
  now?: () => Date;
};

export type PaginateRecordsOptions = {
  runId: string;
  organizationId: string;
  filters: ExtractionFilters;
  resumeFrom?: ResumePoint | null;
  checkCancel?: RunPredicate;
  checkPause?: RunPredicate;
  onCheckpoint?: CheckpointCallback;
  sourceService?: string;
  recordUrlBase?: string;
};

const shortCursor = (cursor: string | null): string | null =>
  cursor != null && cursor.length > 50 ? `${cursor.slice(0, 50)}...` : cursor;

const logEvent = (event: string, fields: Record<string, unknown>) => {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event, ...fields }));
};

/**
 * Walks the cursor-paginated record list one page at a time and yields each
 * record as it is transformed. The sequence is lazy and single-pass; to pick
 * up where a run stopped, start a new one with `resumeFrom` set from its last
 * checkpoint. Cancel and pause are polled once per page, pause also before
 * every record.
 *
 * Only a failed page fetch ends the sequence with an exception, after an
 * `error` checkpoint holding the cursor to retry from.
 */
export async function* paginateRecords(
  deps: PaginatorDeps,
  options: PaginateRecordsOptions
): AsyncGenerator<NormalizedRecord, void, undefined> {
  const { client, transform = transformRecord, now = () => new Date() } = deps;
  const { runId, organizationId, filters, checkCancel, checkPause, onCheckpoint } = options;
  const service = options.sourceService ?? defaultSourceService;
  const batchSize = Math.min(filters.batchSize, crmBatchSizeLimit);
  const associations = associationsFor(filters);

  let cursor = options.resumeFrom?.cursor ?? null;
  let pageNumber = options.resumeFrom?.pageNumber ?? 0;
  let recordsProcessed = options.resumeFrom?.recordsProcessed ?? 0;

  const checkpoint = (
    phase: CheckpointPhase,
    progress: { cursor: string | null; recordsProcessed: number },
    extra: Record<string, unknown>
  ) =>
    saveCheckpoint(
      onCheckpoint,
      runId,
      buildCheckpoint({
        phase,
        recordsProcessed: progress.recordsProcessed,
        cursor: progress.cursor,
        pageNumber,
        batchSize,
        service,
        timestamp: now().toISOString(),
        extra
      })
    );

  if (options.resumeFrom) {
    logEvent("extract.resumed", {
      runId,
      pageNumber: pageNumber + 1,
      recordsProcessed,
      cursor: shortCursor(cursor)
    });
  } else {
    logEvent("extract.started", { runId, organizationId, batchSize });
  }

  while (pageNumber < filters.maxPages) {
    if (checkCancel && (await checkCancel(runId))) {
      logEvent("extract.cancelled", { runId, pageNumber: pageNumber + 1, recordsProcessed });
      await checkpoint("cancelled", { cursor, recordsProcessed }, {
        cancellationReason: "user_requested",
        cancelledAtPage: pageNumber
      });
      return;
    }

    if (checkPause && (await checkPause(runId))) {
      logEvent("extract.paused", { runId, pageNumber: pageNumber + 1, recordsProcessed });
      await checkpoint("paused", { cursor, recordsProcessed }, {
        pauseReason: "user_requested",
        pausedAtPage: pageNumber,
        pausedAt: now().toISOString()
      });
      return;
    }

    let page: PageResult;
    try {
      page = await client.fetchPage({
        cursor,
        batchSize,
        properties: filters.properties,
        associations,
        includeArchived: filters.includeArchived,
        extraParams: filters.extraParams
      });
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({
        event: "extract.page_failed",
        runId,
        pageNumber: pageNumber + 1,
        recordsProcessed,
        error: toErrorMessage(err)
      }));
      await checkpoint("error", { cursor, recordsProcessed }, {
        error: toErrorMessage(err),
        errorPage: pageNumber + 1,
        recoveryCursor: cursor
      });
      throw wrapPageFetchFailure(err, { pageNumber: pageNumber + 1, recordsProcessed, batchSize });
    }

    if (page.records.length === 0) {
      await checkpoint("completed", { cursor: null, recordsProcessed }, {
        completionStatus: "success",
        endReason: "empty_page",
        totalPages: pageNumber,
        finalTotal: recordsProcessed
      });
      return;
    }

    let pageRecords = 0;
    for (const raw of page.records) {
      if (checkPause && (await checkPause(runId))) {
        logEvent("extract.paused_mid_page", {
          runId,
          pageNumber: pageNumber + 1,
          recordsInPage: pageRecords,
          recordsProcessed: recordsProcessed + pageRecords
        });
        await checkpoint("paused_mid_page", { cursor, recordsProcessed: recordsProcessed + pageRecords }, {
          pauseReason: "user_requested_mid_page",
          recordsCompletedInPage: pageRecords,
          pausedAt: now().toISOString()
        });
        return;
      }

      yield transform(raw, {
        scanId: runId,
        organizationId,
        pageNumber: pageNumber + 1,
        extractedAt: now().toISOString(),
        sourceService: service,
        recordUrlBase: options.recordUrlBase
      });
      pageRecords += 1;
    }

    recordsProcessed += pageRecords;
    pageNumber += 1;

    // The next cursor, so that a resume never fetches this page again.
    if (pageNumber % filters.checkpointInterval === 0) {
      await checkpoint("in_progress", { cursor: page.nextCursor, recordsProcessed }, {
        pagesProcessed: pageNumber,
        lastPageRecords: pageRecords
      });
    }

    if (!page.nextCursor) {
      await checkpoint("completed", { cursor: null, recordsProcessed }, {
        completionStatus: "success",
        totalPages: pageNumber,
        finalTotal: recordsProcessed
      });
      return;
    }

    cursor = page.nextCursor;
  }

  // maxPages counts from the first page of the scan, so continuing needs a larger limit.
  logEvent("extract.max_pages_reached", { runId, pageNumber, maxPages: filters.maxPages, cursor: shortCursor(cursor) });
  await checkpoint("in_progress", { cursor, recordsProcessed }, {
    pagesProcessed: pageNumber,
    stopReason: "max_pages"
  });
}
