import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { lib } from "@vidvault/shared";
import type { RunOptions } from "@vidvault/shared";
import { unwrapOrExit } from "../../utils/unwrap";
import type { ConfigFlags } from "../utils";
import {
  createDeps,
  FATAL_EXIT_CODE,
  loadConfig,
  printSummary,
  withPipelineOptions
} from "../utils";

export const defineCommand = (parent: Command) => {
  withPipelineOptions(
    parent
      .command('run')
      .description('Ingest new videos from raw/, heal missing artifacts, then commit and push')
  ).action((flags: ConfigFlags) => runOnce(flags, { ingest: true }));
}

/**
 * Shared by `run` and `heal`: one pipeline pass with a spinner, exiting on
 * fatal errors only.
 */
export const runOnce = async (flags: ConfigFlags, stages: Pick<RunOptions, 'ingest'>) => {
  const config = loadConfig(flags);
  const spinner = flags.quiet ? undefined : ora();
  const start = Date.now();

  console.log(chalk.blue(`Library: ${lib.paths.dirs(config.baseDir).base}`));

  const res = await lib.pipeline.run(config, createDeps(config, spinner), {
    spinner,
    ingest: stages.ingest,
    publish: flags.publish,
  });
  spinner?.stop();

  const summary = unwrapOrExit(res, FATAL_EXIT_CODE, 'Aborted:');
  printSummary(summary, Date.now() - start);
}
