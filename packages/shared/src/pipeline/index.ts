import { deriveArtifact } from "./derive";
import { ingest } from "./ingest";
import { heal } from "./heal";
import { publish, archiveDirty } from "./publish";
import { prepare, startingId, runPipeline } from "./run";

export type { IngestResult } from "./ingest";
export type { HealResult } from "./heal";
export type { PublishOutcome } from "./publish";
export type { RunSummary, RunOptions } from "./run";

export const pipeline = {
  deriveArtifact,
  ingest,
  heal,
  publish,
  archiveDirty,
  prepare,
  startingId,
  run: runPipeline,
}
