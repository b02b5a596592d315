import * as path from "path";
import { err, ok, Result } from "neverthrow";
import type { ArchiveDirs, VideoRecord } from "../types";
import type { PipelineError } from "../errors";
import { paths } from "../paths";
import { storage } from "../storage";

const records = async (dirs: ArchiveDirs): Promise<Result<VideoRecord[], PipelineError>> => {
  const listRes = await storage.listArchive(dirs);
  if (listRes.isErr()) {
    return err(listRes.error);
  }

  const result: VideoRecord[] = [];
  for (const entry of listRes.value.entries) {
    const lqPath = paths.lqVideo(dirs, entry.id);
    const previewPath = paths.preview(dirs, entry.id);
    result.push({
      id: entry.id,
      hqPath: path.join(dirs.hq, entry.filename),
      lqPath,
      previewPath,
      hasLowQuality: await storage.filePresent(lqPath),
      hasPreview: await storage.filePresent(previewPath),
    });
  }

  return ok(result);
}

const isComplete = (record: VideoRecord) => record.hasLowQuality && record.hasPreview;

const incomplete = (all: VideoRecord[]) => all.filter(r => !isComplete(r));

export const archive = {
  records,
  isComplete,
  incomplete,
}
