import * as path from "path";
import { err, ok, Result } from "neverthrow";
import type { ArchiveDirs, TranscodeClient, VideoId } from "../types";
import { PipelineError } from "../errors";
import { paths } from "../paths";
import { storage } from "../storage";
import type { ArchiveEntry } from "../storage";
import type { PipelineOptions } from "../log";
import { logFor } from "../log";
import { deriveArtifact } from "./derive";

export interface IngestResult {
  /** Raw files that were archived with both derived artifacts. */
  processed: number;
  nextId: number;
  changed: boolean;
  failures: PipelineError[];
}

/**
 * Archive copy with the same contents as `rawPath`, if there is one. Sizes are
 * compared first so only same-sized copies get hashed. `hashes` caches archive
 * hashes across calls within one ingest.
 */
const findArchivedCopy = async (
  dirs: ArchiveDirs,
  rawPath: string,
  known: ArchiveEntry[],
  hashes: Map<string, string>
): Promise<Result<ArchiveEntry | null, Error>> => {
  const rawSizeRes = await storage.fileSize(rawPath);
  if (rawSizeRes.isErr()) {
    return err(rawSizeRes.error);
  }

  let rawHash: string | null = null;
  for (const entry of known) {
    const hqPath = path.join(dirs.hq, entry.filename);
    // An archive copy that cannot be read cannot be matched; heal reports it
    const sizeRes = await storage.fileSize(hqPath);
    if (sizeRes.isErr() || sizeRes.value !== rawSizeRes.value) continue;

    if (rawHash === null) {
      const rawHashRes = await storage.contentHash(rawPath);
      if (rawHashRes.isErr()) {
        return err(rawHashRes.error);
      }
      rawHash = rawHashRes.value;
    }

    let hqHash = hashes.get(hqPath);
    if (hqHash === undefined) {
      const hqHashRes = await storage.contentHash(hqPath);
      if (hqHashRes.isErr()) continue;
      hqHash = hqHashRes.value;
      hashes.set(hqPath, hqHash);
    }

    if (hqHash === rawHash) {
      return ok(entry);
    }
  }

  return ok(null);
}

/**
 * Derives whichever of the low-quality copy and preview are missing for `id`.
 * False when a derivation failed; the failure is already recorded in `result`.
 */
const completeEntry = async (
  dirs: ArchiveDirs,
  id: VideoId,
  hqPath: string,
  filename: string,
  transcoder: TranscodeClient,
  options: PipelineOptions,
  result: IngestResult
): Promise<boolean> => {
  const log = logFor(options);
  const lqPath = paths.lqVideo(dirs, id);
  const previewPath = paths.preview(dirs, id);

  if (!await storage.filePresent(lqPath)) {
    options.spinner?.start(`[${id}] Transcoding low quality copy...`);
    const lqRes = await deriveArtifact(transcoder, 'low-quality', hqPath, lqPath);
    if (lqRes.isErr()) {
      log.fail(`[${id}] ${lqRes.error.message}. ${filename} stays in the inbox.`);
      result.failures.push(lqRes.error);
      return false;
    }
    result.changed = true;
  }

  if (!await storage.filePresent(previewPath)) {
    options.spinner?.start(`[${id}] Extracting preview...`);
    const previewRes = await deriveArtifact(transcoder, 'preview', lqPath, previewPath);
    if (previewRes.isErr()) {
      log.fail(`[${id}] ${previewRes.error.message}. ${filename} stays in the inbox.`);
      result.failures.push(previewRes.error);
      return false;
    }
    result.changed = true;
  }

  return true;
}

/**
 * Moves every raw video in the inbox into the archive under the next free
 * identifier, deriving its low-quality copy and preview on the way.
 *
 * An identifier is only used up once the high-quality copy exists. The raw
 * file stays in the inbox unless both derived artifacts were written. A raw
 * file whose contents are already archived keeps that identifier: its missing
 * artifacts are derived and it leaves the inbox without a second copy.
 */
export const ingest = async (
  dirs: ArchiveDirs,
  nextId: number,
  transcoder: TranscodeClient,
  options: PipelineOptions = {}
): Promise<IngestResult> => {
  const log = logFor(options);
  const result: IngestResult = { processed: 0, nextId, changed: false, failures: [] };

  const listRes = await storage.listInbox(dirs);
  if (listRes.isErr()) {
    log.fail(listRes.error.message);
    result.failures.push(listRes.error);
    return result;
  }

  const rawFiles = listRes.value;
  if (rawFiles.length === 0) {
    log.info('Inbox is empty.');
    return result;
  }

  log.info(`Found ${rawFiles.length} new video(s) in ${dirs.inbox}`);

  const archiveRes = await storage.listArchive(dirs);
  const known: ArchiveEntry[] = [];
  if (archiveRes.isErr()) {
    log.warn(`${archiveRes.error.message}. Inbox files are not checked against earlier copies.`);
  } else {
    known.push(...archiveRes.value.entries);
  }
  const hashes = new Map<string, string>();

  for (const filename of rawFiles) {
    const rawPath = path.join(dirs.inbox, filename);

    const matchRes = await findArchivedCopy(dirs, rawPath, known, hashes);
    if (matchRes.isErr()) {
      log.warn(`Could not compare ${filename} with the archive: ${matchRes.error.message}`);
    }
    const match = matchRes.unwrapOr(null);

    let id: VideoId;
    let hqPath: string;
    if (match) {
      id = match.id;
      hqPath = path.join(dirs.hq, match.filename);
      log.info(`[${id}] ${filename} is already archived as ${match.filename}`);
    } else {
      id = result.nextId as VideoId;
      hqPath = paths.hqVideo(dirs, id, path.extname(filename));

      options.spinner?.start(`[${id}] Copying ${filename}...`);
      const copyRes = await storage.copyFile(rawPath, hqPath);
      if (copyRes.isErr()) {
        const failure = new PipelineError('copy', rawPath, copyRes.error);
        log.fail(`[${id}] ${failure.message}`);
        result.failures.push(failure);
        continue;
      }
      result.nextId += 1;
      result.changed = true;
      known.push({ id, filename: path.basename(hqPath) });
    }

    if (!await completeEntry(dirs, id, hqPath, filename, transcoder, options, result)) {
      continue;
    }

    result.processed += 1;

    const removeRes = await storage.removeFile(rawPath);
    if (removeRes.isErr()) {
      const failure = new PipelineError('remove-raw', rawPath, removeRes.error);
      log.warn(`[${id}] ${failure.message}. The archive copy is complete.`);
      result.failures.push(failure);
      continue;
    }

    log.success(`[${id}] Archived ${filename} as ${path.basename(hqPath)}`);
  }

  return result;
}
