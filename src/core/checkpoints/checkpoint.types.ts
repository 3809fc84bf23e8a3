export const checkpointPhases = [
  "in_progress",
  "completed",
  "cancelled",
  "paused",
  "paused_mid_page",
  "error"
] as const;

export type CheckpointPhase = (typeof checkpointPhases)[number];

/**
 * Snapshot of one run's progress. A new object is built for every write;
 * `cursor` is the page a resumed run fetches first.
 */
export type CheckpointState = Readonly<{
  phase: CheckpointPhase;
  recordsProcessed: number;
  cursor: string | null;
  pageNumber: number;
  batchSize: number;
  extra: Readonly<Record<string, unknown>>;
}>;

export type ResumePoint = {
  cursor: string | null;
  pageNumber: number;
  recordsProcessed: number;
};

export const isCheckpointPhase = (value: unknown): value is CheckpointPhase =>
  typeof value === "string" && checkpointPhases.some((phase) => phase === value);

const resumablePhases: ReadonlySet<CheckpointPhase> = new Set<CheckpointPhase>([
  "in_progress",
  "paused",
  "paused_mid_page",
  "error"
]);

export const isResumablePhase = (phase: CheckpointPhase): boolean => resumablePhases.has(phase);

export const isResumable = (state: CheckpointState): boolean => isResumablePhase(state.phase);

/**
 * A mid-page pause stores the cursor of the page it stopped in, so a resumed
 * run fetches that page again; its already-counted records are taken back out
 * of the total.
 */
export const toResumePoint = (state: CheckpointState): ResumePoint => {
  const inPage = state.extra.recordsCompletedInPage;
  const replayed =
    state.phase === "paused_mid_page" && typeof inPage === "number" && Number.isInteger(inPage) && inPage > 0
      ? Math.min(inPage, state.recordsProcessed)
      : 0;

  return {
    cursor: state.cursor,
    pageNumber: state.pageNumber,
    recordsProcessed: state.recordsProcessed - replayed
  };
};
