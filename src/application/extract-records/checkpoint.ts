import type { CheckpointPhase, CheckpointState } from "../../core/checkpoints/checkpoint.types";
import { toErrorMessage } from "./extract.error-handler";

export type CheckpointCallback = (runId: string, state: CheckpointState) => void | Promise<void>;

export const buildCheckpoint = (args: {
  phase: CheckpointPhase;
  recordsProcessed: number;
  cursor: string | null;
  pageNumber: number;
  batchSize: number;
  service: string;
  timestamp: string;
  extra?: Record<string, unknown>;
}): CheckpointState =>
  Object.freeze({
    phase: args.phase,
    recordsProcessed: args.recordsProcessed,
    cursor: args.cursor,
    pageNumber: args.pageNumber,
    batchSize: args.batchSize,
    extra: Object.freeze({ service: args.service, timestamp: args.timestamp, ...args.extra })
  });

/**
 * Hands a checkpoint to the caller's callback. A failing callback is logged
 * and otherwise ignored: the run keeps going with degraded resumability.
 */
export const saveCheckpoint = async (
  callback: CheckpointCallback | undefined,
  runId: string,
  state: CheckpointState
): Promise<boolean> => {
  if (!callback) return false;

  try {
    await callback(runId, state);
    return true;
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "extract.checkpoint_failed",
      runId,
      phase: state.phase,
      pageNumber: state.pageNumber,
      error: toErrorMessage(err)
    }));
    return false;
  }
};
