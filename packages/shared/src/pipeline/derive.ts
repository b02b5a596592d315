import * as fs from "fs/promises";
import { err, ok, Result, ResultAsync } from "neverthrow";
import type { ArtifactKind, TranscodeClient } from "../types";
import type { PipelineOperation } from "../errors";
import { PipelineError } from "../errors";
import { paths } from "../paths";
import { toError } from "../util";

const OPERATION: Record<ArtifactKind, PipelineOperation> = {
  'low-quality': 'derive-low-quality',
  'preview': 'derive-preview',
};

const failWith = async (kind: ArtifactKind, outputPath: string, partialPath: string, cause: Error): Promise<PipelineError> => {
  const rmRes = await ResultAsync.fromPromise(fs.rm(partialPath, { force: true }), toError);
  if (rmRes.isErr()) {
    cause = new Error(`${cause.message} (leftover ${partialPath} could not be removed: ${rmRes.error.message})`, { cause });
  }
  return new PipelineError(OPERATION[kind], outputPath, cause);
}

/**
 * Runs one derivation into a hidden partial file and moves it to `outputPath`
 * once the transcoder succeeds. On failure nothing is left at `outputPath`.
 */
export const deriveArtifact = async (
  transcoder: TranscodeClient,
  kind: ArtifactKind,
  inputPath: string,
  outputPath: string
): Promise<Result<void, PipelineError>> => {
  const partialPath = paths.partial(outputPath);

  const res = await transcoder.derive(kind, inputPath, partialPath);
  if (res.isErr()) {
    return err(await failWith(kind, outputPath, partialPath, res.error));
  }

  const renameRes = await ResultAsync.fromPromise(fs.rename(partialPath, outputPath), toError);
  if (renameRes.isErr()) {
    return err(await failWith(kind, outputPath, partialPath, renameRes.error));
  }

  return ok(undefined);
}
