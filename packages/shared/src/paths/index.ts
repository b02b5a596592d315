import * as path from "path";
import type { ArchiveDirs, VideoId } from "../types";

export const INBOX_DIR = 'raw';
export const HQ_DIR = 'vidHQ';
export const LQ_DIR = 'vidLQ';
export const PREVIEW_DIR = 'previews';

export const LQ_EXT = '.mp4';
export const PREVIEW_EXT = '.jpg';

const dirs = (baseDir: string): ArchiveDirs => {
  const base = path.resolve(baseDir);
  return {
    base,
    inbox: path.join(base, INBOX_DIR),
    hq: path.join(base, HQ_DIR),
    lq: path.join(base, LQ_DIR),
    previews: path.join(base, PREVIEW_DIR),
  };
}

const hqVideo = (d: ArchiveDirs, id: VideoId, ext: string) => path.join(d.hq, `${id}${ext.toLowerCase()}`);
const lqVideo = (d: ArchiveDirs, id: VideoId) => path.join(d.lq, `${id}${LQ_EXT}`);
const preview = (d: ArchiveDirs, id: VideoId) => path.join(d.previews, `${id}${PREVIEW_EXT}`);

// Hidden sibling that a derivation writes to before it is renamed into place.
// The extension is kept so ffmpeg can pick the output format from it.
const partial = (target: string) => {
  const { dir, name, ext } = path.parse(target);
  return path.join(dir, `.${name}.partial${ext}`);
}

/**
 * Parses an archive filename stem into an identifier. Returns null for
 * anything that is not a positive decimal integer.
 */
const parseId = (filename: string): VideoId | null => {
  const stem = path.parse(filename).name;
  if (!/^\d+$/.test(stem)) return null;
  const id = Number.parseInt(stem, 10);
  if (!Number.isSafeInteger(id) || id < 1) return null;
  return id as VideoId;
}

export const paths = {
  dirs,
  hqVideo,
  lqVideo,
  preview,
  partial,
  parseId,

  /** Archive directories relative to the base, as handed to git. */
  archiveRelative: () => [HQ_DIR, LQ_DIR, PREVIEW_DIR],
}
