#!/usr/bin/env tsx

/**
 * vidvault CLI - video library maintenance
 *
 * Pulls raw videos into a numbered archive, derives low quality copies and
 * preview frames with ffmpeg, repairs missing ones, and publishes the library
 * with git.
 */

import { Command } from 'commander';
import { defineCommand as defineRun } from './commands/run';
import { defineCommand as defineHeal } from './commands/heal';
import { defineCommand as defineStatus } from './commands/status';
import { defineCommand as defineWatch } from './commands/watch';

const program = new Command();

program
  .name('vidvault')
  .description('Ingest, transcode and publish a numbered video library')
  .version('0.1.0');

defineRun(program);
defineHeal(program);
defineStatus(program);
defineWatch(program);

program.parseAsync().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
