import { err, ok, Result } from "neverthrow";
import type { ArchiveDirs, PipelineDeps, VaultConfig } from "../types";
import type { PipelineOptions } from "../log";
import type { PublishOutcome } from "./publish";
import { PipelineError } from "../errors";
import { logFor } from "../log";
import { paths } from "../paths";
import { storage } from "../storage";
import { ingest } from "./ingest";
import { heal } from "./heal";
import { publish } from "./publish";

export interface RunSummary {
  ingested: number;
  healed: number;
  nextId: number;
  changed: boolean;
  publish: PublishOutcome | 'failed';
  failures: PipelineError[];
}

export type RunOptions = PipelineOptions & {
  /** Pull new files from the inbox. Defaults to true. */
  ingest?: boolean;
  /** Commit and push when something changed. Defaults to true. */
  publish?: boolean;
}

/**
 * Checks the transcoder, then makes sure the working directories exist. The
 * transcoder goes first so a bad executable path aborts before anything on
 * disk is touched.
 */
export const prepare = async (config: VaultConfig, deps: PipelineDeps): Promise<Result<ArchiveDirs, PipelineError>> => {
  const availableRes = await deps.transcoder.available();
  if (availableRes.isErr()) {
    return err(new PipelineError('transcoder-check', config.ffmpegPath, availableRes.error));
  }

  const dirs = paths.dirs(config.baseDir);
  const ensureRes = await storage.ensureDirectories(dirs);
  if (ensureRes.isErr()) {
    return err(ensureRes.error);
  }

  return ok(dirs);
}

/**
 * Identifier the next ingested file gets. An unreadable archive is treated
 * as empty.
 */
export const startingId = async (dirs: ArchiveDirs, options: PipelineOptions = {}): Promise<number> => {
  const highestRes = await storage.highestId(dirs);
  if (highestRes.isErr()) {
    logFor(options).warn(`${highestRes.error.message}. Numbering starts from 1.`);
    return 1;
  }
  return highestRes.value + 1;
}

/**
 * One maintenance pass: ingest, heal, publish, in that order. Only a missing
 * transcoder or an uncreatable directory makes this return an error; every
 * other failure is reported and collected in the summary.
 */
export const runPipeline = async (config: VaultConfig, deps: PipelineDeps, options: RunOptions = {}): Promise<Result<RunSummary, PipelineError>> => {
  const log = logFor(options);

  const prepareRes = await prepare(config, deps);
  if (prepareRes.isErr()) {
    return err(prepareRes.error);
  }
  const dirs = prepareRes.value;

  const summary: RunSummary = {
    ingested: 0,
    healed: 0,
    nextId: await startingId(dirs, options),
    changed: false,
    publish: 'skipped',
    failures: [],
  };

  if (options.ingest ?? true) {
    const ingestRes = await ingest(dirs, summary.nextId, deps.transcoder, options);
    summary.ingested = ingestRes.processed;
    summary.nextId = ingestRes.nextId;
    summary.changed = ingestRes.changed;
    summary.failures.push(...ingestRes.failures);
  }

  const healRes = await heal(dirs, deps.transcoder, options);
  summary.healed = healRes.healed;
  summary.changed = summary.changed || healRes.changed;
  summary.failures.push(...healRes.failures);

  if (options.publish ?? true) {
    const publishRes = await publish(dirs.base, config.commitMessage, summary.changed, deps.vcs, options);
    if (publishRes.isErr()) {
      summary.publish = 'failed';
      summary.failures.push(publishRes.error);
    } else {
      summary.publish = publishRes.value;
    }
  } else {
    log.info('Publishing disabled.');
  }

  return ok(summary);
}
