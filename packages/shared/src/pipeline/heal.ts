import * as path from "path";
import type { ArchiveDirs, TranscodeClient, VideoId } from "../types";
import type { PipelineError } from "../errors";
import type { PipelineOptions } from "../log";
import { logFor } from "../log";
import { paths } from "../paths";
import { storage } from "../storage";
import { deriveArtifact } from "./derive";

export interface HealResult {
  /** Derived artifacts created. */
  healed: number;
  changed: boolean;
  failures: PipelineError[];
}

/**
 * Fills in missing low-quality copies and previews for every archived video.
 * Artifacts that already exist are never touched, so a second pass over an
 * unchanged archive runs no transcodes.
 */
export const heal = async (
  dirs: ArchiveDirs,
  transcoder: TranscodeClient,
  options: PipelineOptions = {}
): Promise<HealResult> => {
  const log = logFor(options);
  const result: HealResult = { healed: 0, changed: false, failures: [] };

  const listRes = await storage.listArchive(dirs);
  if (listRes.isErr()) {
    log.fail(listRes.error.message);
    result.failures.push(listRes.error);
    return result;
  }

  for (const name of listRes.value.ignored) {
    log.warn(`Skipping ${name} in ${dirs.hq}: not a numbered archive file`);
  }

  for (const entry of listRes.value.entries) {
    await healEntry(dirs, entry.id, entry.filename, transcoder, options, result);
  }

  if (result.healed > 0) {
    log.success(`Healed ${result.healed} missing artifact(s).`);
  }

  return result;
}

const healEntry = async (
  dirs: ArchiveDirs,
  id: VideoId,
  filename: string,
  transcoder: TranscodeClient,
  options: PipelineOptions,
  result: HealResult
) => {
  const log = logFor(options);
  const hqPath = path.join(dirs.hq, filename);
  const lqPath = paths.lqVideo(dirs, id);
  const previewPath = paths.preview(dirs, id);

  if (!await storage.filePresent(lqPath)) {
    options.spinner?.start(`[${id}] Low quality copy missing, transcoding...`);
    const res = await deriveArtifact(transcoder, 'low-quality', hqPath, lqPath);
    if (res.isErr()) {
      log.fail(`[${id}] ${res.error.message}`);
      result.failures.push(res.error);
    } else {
      log.success(`[${id}] Recreated ${lqPath}`);
      result.healed += 1;
      result.changed = true;
    }
  }

  if (!await storage.filePresent(previewPath)) {
    // Prefer the smaller low quality copy as the frame source when there is one
    const source = await storage.filePresent(lqPath) ? lqPath : hqPath;
    options.spinner?.start(`[${id}] Preview missing, extracting...`);
    const res = await deriveArtifact(transcoder, 'preview', source, previewPath);
    if (res.isErr()) {
      log.fail(`[${id}] ${res.error.message}`);
      result.failures.push(res.error);
    } else {
      log.success(`[${id}] Recreated ${previewPath}`);
      result.healed += 1;
      result.changed = true;
    }
  }
}
