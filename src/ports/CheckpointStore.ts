import type { CheckpointState } from "../core/checkpoints/checkpoint.types";

export interface CheckpointStore {
  save(runId: string, state: CheckpointState): Promise<void>;
  load(runId: string): Promise<CheckpointState | null>;
}
