#!/usr/bin/env node
import { runExtraction } from "../composition/root";
import type { ExtractionRunSummary } from "../application/extract-records/extract.error-handler";
import { isResumablePhase } from "../core/checkpoints/checkpoint.types";
import { reportCliFailure } from "./failureEnvelope";

/** The environment a follow-up run needs to continue where this one stopped, or null when it finished. */
export const resumeHint = (summary: ExtractionRunSummary) => {
  if (!isResumablePhase(summary.phase)) return null;
  return {
    event: "extract.resumable",
    runId: summary.runId,
    phase: summary.phase,
    recordsProcessed: summary.recordsProcessed,
    resumeWith: { EXTRACT_SCAN_ID: summary.runId, EXTRACT_RESUME: "true" }
  };
};

export const executeExtractCli = async (): Promise<void> => {
  let summary: ExtractionRunSummary;
  try {
    summary = await runExtraction();
  } catch (err) {
    reportCliFailure(err, "extract.failed");
    process.exit(1);
  }

  const hint = resumeHint(summary);
  if (hint) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(hint));
  }
};

if (require.main === module) {
  void executeExtractCli();
}
