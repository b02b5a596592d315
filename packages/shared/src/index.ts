/**
 * vidvault shared library
 *
 * Archive layout, the ffmpeg and git clients, and the ingest / heal / publish
 * pipeline used by the CLI.
 */

import { archive } from './archive';
import { config } from './config';
import { paths } from './paths';
import { storage } from './storage';
import { pipeline } from './pipeline';
import { ffmpeg } from './ffmpeg';
import { git } from './git';
import { fmt } from './fmt';

export * from './types';
export { PipelineError } from './errors';
export type { PipelineOperation } from './errors';
export type { Log, PipelineOptions } from './log';
export { consoleLog, spinnerLog, logFor } from './log';
export type { ConfigInput } from './config';
export type { IngestResult, HealResult, PublishOutcome, RunSummary, RunOptions } from './pipeline';
export type { TranscodeProgress } from './ffmpeg';
export { toError } from './util';

export const lib = {
  fmt,
  archive,
  config,
  paths,
  storage,
  pipeline,
  ffmpeg,
  git
}
