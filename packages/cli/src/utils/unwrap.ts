import chalk from 'chalk';
import type { Result } from 'neverthrow';

export const unwrapOrExit = <K>(res: Result<K, Error>, code: number, message?: string): K => {
  return res.match(ok => ok, err => {
    if (message) {
      console.error(chalk.red(message), err.message);
    } else {
      console.error(chalk.red(err.message));
    }

    process.exit(code);
  });
}
