import * as path from "path";
import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import watcher from "@parcel/watcher";
import { lib } from "@vidvault/shared";
import { unwrapOrExit } from "../../utils/unwrap";
import { createDeps, FATAL_EXIT_CODE, loadConfig, printSummary, withPipelineOptions } from "../utils";
import type { ConfigFlags } from "../utils";

type WatchFlags = ConfigFlags & {
  debounce: string;
};

export const defineCommand = (parent: Command) => {
  withPipelineOptions(
    parent
      .command('watch')
      .description('Run the pipeline now and again whenever a video lands in raw/ (Continuous Loop)')
  )
    .option('--debounce <ms>', 'Quiet period after the last inbox change before a run', '2000')
    .action(run);
}

export interface CycleRunner {
  trigger(): void;
  runCycle(): Promise<void>;
  cancel(): void;
}

/**
 * Serialises pipeline cycles. A trigger while a cycle is running queues
 * exactly one follow-up cycle, which runs even if that cycle failed; triggers
 * while idle are debounced. A failed cycle is logged and never rejects.
 */
export const createCycleRunner = (cycle: () => Promise<void>, debounceMs: number): CycleRunner => {
  let isProcessing = false;
  let pendingTrigger = false;
  let debounceTimer: NodeJS.Timeout | null = null;

  const runCycle = async (): Promise<void> => {
    if (isProcessing) {
      pendingTrigger = true;
      return;
    }
    isProcessing = true;
    pendingTrigger = false;

    try {
      await cycle();
    } catch (e: unknown) {
      console.error(chalk.red("Cycle failed:"), e);
    } finally {
      isProcessing = false;
    }

    if (pendingTrigger) {
      await runCycle();
    }
  };

  const trigger = () => {
    if (isProcessing) {
      pendingTrigger = true;
      return;
    }
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(() => {
      debounceTimer = null;
      void runCycle();
    }, debounceMs);
  };

  const cancel = () => {
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = null;
  };

  return { trigger, runCycle, cancel };
}

async function run(flags: WatchFlags) {
  const config = loadConfig(flags);
  const debounceMs = Number.parseInt(flags.debounce, 10);
  if (!Number.isInteger(debounceMs) || debounceMs < 0) {
    console.error(chalk.red(`Invalid --debounce value: ${flags.debounce}`));
    process.exit(FATAL_EXIT_CODE);
  }

  const dirs = lib.paths.dirs(config.baseDir);
  console.log(chalk.blue(`Watching ${dirs.inbox}... (Press Ctrl+C to exit)`));

  const cycle = async () => {
    const spinner = flags.quiet ? undefined : ora();
    const start = Date.now();
    const res = await lib.pipeline.run(config, createDeps(config, spinner), {
      spinner,
      publish: flags.publish,
    });
    spinner?.stop();
    printSummary(unwrapOrExit(res, FATAL_EXIT_CODE, 'Aborted:'), Date.now() - start);
  };

  const runner = createCycleRunner(cycle, debounceMs);

  // The first cycle creates raw/ if needed, so it has to finish before subscribing
  await runner.runCycle();

  const subscription = await watcher.subscribe(dirs.inbox, (err, events) => {
    if (err) {
      console.error(chalk.red("Error watching inbox:"), err);
      return;
    }
    // Our own removals from raw/ show up as deletes; only new or growing files matter
    const arrivals = events.filter(e => e.type !== 'delete' && lib.storage.isVideoFile(path.basename(e.path)));
    if (arrivals.length > 0) {
      runner.trigger();
    }
  });

  process.on('SIGINT', () => {
    console.log(chalk.yellow("\nStopping watch loop..."));
    runner.cancel();
    subscription.unsubscribe().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error(chalk.red("Failed to stop watcher:"), e);
        process.exit(FATAL_EXIT_CODE);
      }
    );
  });
}
