import { Command } from "commander";
import chalk from "chalk";
import type { Ora } from "ora";
import { lib } from "@vidvault/shared";
import type { ConfigInput, PipelineDeps, RunSummary, VaultConfig } from "@vidvault/shared";
import { unwrapOrExit } from "../utils/unwrap";

export const FATAL_EXIT_CODE = 1;

export type ConfigFlags = ConfigInput & {
  publish: boolean;
  quiet?: boolean;
};

/**
 * Flags shared by every command that reads the library or runs ffmpeg.
 */
export const withConfigOptions = (cmd: Command): Command =>
  cmd
    .option('-d, --dir <path>', 'Library base directory (default: current directory)')
    .option('--ffmpeg <path>', 'ffmpeg executable')
    .option('--git <path>', 'git executable')
    .option('-m, --message <text>', 'Commit message used when publishing')
    .option('--crf <n>', 'Low quality compression factor (lower is better quality)')
    .option('--width <px>', 'Low quality target width in pixels')
    .option('--codec <name>', 'Low quality video codec')
    .option('--preset <name>', 'Low quality encoder preset');

export const withPipelineOptions = (cmd: Command): Command =>
  withConfigOptions(cmd)
    .option('--no-publish', 'Do not commit or push afterwards')
    .option('-q, --quiet', 'Plain log lines instead of a spinner');

export const loadConfig = (flags: ConfigInput): VaultConfig =>
  unwrapOrExit(lib.config.resolve(flags), FATAL_EXIT_CODE);

export const createDeps = (config: VaultConfig, spinner?: Ora): PipelineDeps => ({
  transcoder: lib.ffmpeg.createTranscodeClient(config.ffmpegPath, config.lowQuality, (progress) => {
    if (!spinner) return;
    let text = `Transcoding low quality copy`;
    if (progress.time) {
      text += ` (${progress.time})`;
    }
    if (progress.fps) {
      text += ` ${progress.fps} fps`;
    }
    if (progress.speed) {
      text += ` ${progress.speed}`;
    }
    spinner.text = text;
  }),
  vcs: lib.git.createGitClient(config.gitPath),
});

export const printSummary = (summary: RunSummary, elapsedMs: number) => {
  const parts = [
    `${lib.fmt.count(summary.ingested, 'video')} ingested`,
    `${lib.fmt.count(summary.healed, 'artifact')} healed`,
    lib.fmt.publishOutcome(summary.publish),
  ];
  if (summary.failures.length > 0) {
    parts.push(chalk.red(`${lib.fmt.count(summary.failures.length, 'failure')}`));
  }
  console.log(`${chalk.bold('Done')} in ${lib.fmt.duration(elapsedMs)}: ${parts.join(chalk.gray(' | '))}`);
}
