import * as path from "path";
import { Command } from "commander";
import Table from "cli-table3";
import chalk from "chalk";
import { lib } from "@vidvault/shared";
import type { ConfigInput } from "@vidvault/shared";
import { unwrapOrExit } from "../../utils/unwrap";
import { FATAL_EXIT_CODE, loadConfig } from "../utils";

type StatusFlags = Pick<ConfigInput, 'dir'> & {
  missing?: boolean;
};

export const defineCommand = (parent: Command) => {
  parent
    .command('status')
    .description('Show archived videos and which derived artifacts they are missing')
    .option('-d, --dir <path>', 'Library base directory (default: current directory)')
    .option('--missing', 'Only list videos with a missing low quality copy or preview')
    .action(run);
}

async function run(flags: StatusFlags) {
  const config = loadConfig({ dir: flags.dir });
  const dirs = lib.paths.dirs(config.baseDir);

  const records = unwrapOrExit(await lib.archive.records(dirs), FATAL_EXIT_CODE, 'Could not read archive:');
  const incomplete = lib.archive.incomplete(records);
  const shown = flags.missing ? incomplete : records;

  // The inbox may not exist yet on a fresh library
  const inbox = (await lib.storage.listInbox(dirs)).unwrapOr([]);
  const nextId = records.reduce((max, r) => Math.max(max, r.id), 0) + 1;

  if (shown.length === 0) {
    console.log(flags.missing ? "No videos are missing artifacts." : "No archived videos.");
  } else {
    const table = new Table({
      head: ['ID', 'Source', lib.fmt.artifactKind('low-quality'), lib.fmt.artifactKind('preview')],
      style: { head: [] },
    });

    for (const record of shown) {
      table.push([
        record.id.toString(),
        chalk.gray(path.relative(dirs.base, record.hqPath)),
        lib.fmt.present(record.hasLowQuality),
        lib.fmt.present(record.hasPreview),
      ]);
    }

    console.log(table.toString());
  }

  console.log(`${lib.fmt.count(records.length, 'video')} archived, ${incomplete.length} incomplete`);
  console.log(`${lib.fmt.count(inbox.length, 'file')} waiting in ${dirs.inbox}`);
  console.log(chalk.gray(`Next identifier: ${nextId}`));
}
