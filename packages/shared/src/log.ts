import chalk from "chalk";
import type { Ora } from "ora";

/**
 * Operator-facing output for pipeline code. Goes through the spinner when the
 * caller has one running, straight to the console otherwise.
 */
export interface Log {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  fail(message: string): void;
}

export const consoleLog: Log = {
  info: (message) => console.log(chalk.blue(message)),
  success: (message) => console.log(chalk.green(message)),
  warn: (message) => console.warn(chalk.yellow(message)),
  fail: (message) => console.error(chalk.red(message)),
};

export const spinnerLog = (spinner: Ora): Log => ({
  info: (message) => { spinner.info(message); },
  success: (message) => { spinner.succeed(message); },
  warn: (message) => { spinner.warn(message); },
  fail: (message) => { spinner.fail(message); },
});

export type PipelineOptions = {
  spinner?: Ora;
}

export const logFor = (options: PipelineOptions): Log =>
  options.spinner ? spinnerLog(options.spinner) : consoleLog;
