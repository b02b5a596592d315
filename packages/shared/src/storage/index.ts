import { err, ok, Result, ResultAsync } from "neverthrow";
import * as crypto from "crypto";
import * as fs from "fs/promises";
import { createReadStream } from "fs";
import * as path from "path";
import { paths } from "../paths";
import type { ArchiveDirs, VideoId } from "../types";
import { hasErrorCode, toError } from "../util";
import { PipelineError } from "../errors";

export const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.m4v', '.mkv', '.avi', '.webm', '.mpg', '.mpeg', '.wmv'];

export interface ArchiveEntry {
  id: VideoId;
  filename: string;
}

const isVideoFile = (filename: string) =>
  !filename.startsWith('.') && VIDEO_EXTENSIONS.includes(path.extname(filename).toLowerCase());

const ensureDirectories = async (dirs: ArchiveDirs): Promise<Result<void, PipelineError>> => {
  for (const dir of [dirs.inbox, dirs.hq, dirs.lq, dirs.previews]) {
    const res = await ResultAsync.fromPromise(fs.mkdir(dir, { recursive: true }), toError);
    if (res.isErr()) {
      return err(new PipelineError('create-directory', dir, res.error));
    }
  }
  return ok(undefined);
}

/**
 * Raw video files waiting in the inbox, sorted by filename so that identifiers
 * are handed out in a reproducible order.
 */
const listInbox = async (dirs: ArchiveDirs): Promise<Result<string[], PipelineError>> => {
  const readRes = await ResultAsync.fromPromise(fs.readdir(dirs.inbox, { withFileTypes: true }), toError);
  if (readRes.isErr()) {
    return err(new PipelineError('read-inbox', dirs.inbox, readRes.error));
  }

  const files = readRes.value
    .filter(entry => entry.isFile() && isVideoFile(entry.name))
    .map(entry => entry.name)
    .sort();

  return ok(files);
}

/**
 * High-quality archive files. Entries that are not videos named by an
 * identifier are returned separately so callers can decide whether to mention
 * them.
 */
const listArchive = async (dirs: ArchiveDirs): Promise<Result<{ entries: ArchiveEntry[], ignored: string[] }, PipelineError>> => {
  const readRes = await ResultAsync.fromPromise(fs.readdir(dirs.hq, { withFileTypes: true }), toError);
  if (readRes.isErr()) {
    // A missing archive is just an empty one
    if (hasErrorCode(readRes.error, 'ENOENT')) {
      return ok({ entries: [], ignored: [] });
    }
    return err(new PipelineError('read-archive', dirs.hq, readRes.error));
  }

  const entries: ArchiveEntry[] = [];
  const ignored: string[] = [];
  for (const entry of readRes.value) {
    if (!entry.isFile() || entry.name.startsWith('.')) continue;

    const id = isVideoFile(entry.name) ? paths.parseId(entry.name) : null;
    if (id === null) {
      ignored.push(entry.name);
    } else {
      entries.push({ id, filename: entry.name });
    }
  }

  entries.sort((a, b) => a.id - b.id);
  return ok({ entries, ignored });
}

const highestId = async (dirs: ArchiveDirs): Promise<Result<number, PipelineError>> => {
  const listRes = await listArchive(dirs);
  if (listRes.isErr()) {
    return err(listRes.error);
  }
  return ok(listRes.value.entries.reduce((max, entry) => Math.max(max, entry.id), 0));
}

const filePresent = async (p: string): Promise<boolean> => {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

const fileSize = async (p: string): Promise<Result<number, Error>> =>
  await ResultAsync.fromPromise(fs.stat(p), toError).map(stats => stats.size);

const hashFile = async (p: string): Promise<string> => {
  const hasher = crypto.createHash('sha256');
  for await (const chunk of createReadStream(p)) {
    hasher.update(chunk);
  }
  return hasher.digest('hex');
}

/** Hex sha256 of the file contents, read as a stream. */
const contentHash = async (p: string): Promise<Result<string, Error>> =>
  await ResultAsync.fromPromise(hashFile(p), toError);

/**
 * Copies through a hidden partial file beside `to`, so an interrupted copy never
 * shows up as an archive entry. An existing `to` is never replaced.
 */
const copyFile = async (from: string, to: string): Promise<Result<void, Error>> => {
  if (await filePresent(to)) {
    return err(new Error(`${to} already exists`));
  }

  const partialPath = paths.partial(to);

  const copyRes = await ResultAsync.fromPromise(fs.copyFile(from, partialPath), toError)
    .andThen(() => ResultAsync.fromPromise(fs.rename(partialPath, to), toError));

  if (copyRes.isErr()) {
    const rmRes = await ResultAsync.fromPromise(fs.rm(partialPath, { force: true }), toError);
    if (rmRes.isErr()) {
      return err(new Error(`${copyRes.error.message} (leftover ${partialPath} could not be removed: ${rmRes.error.message})`, { cause: copyRes.error }));
    }
    return err(copyRes.error);
  }

  return ok(undefined);
}

const removeFile = async (p: string): Promise<Result<void, Error>> =>
  await ResultAsync.fromPromise(fs.rm(p), toError);

export const storage = {
  ensureDirectories,
  listInbox,
  listArchive,
  highestId,
  filePresent,
  fileSize,
  contentHash,
  copyFile,
  removeFile,
  isVideoFile,
}
