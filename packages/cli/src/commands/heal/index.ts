import { Command } from "commander";
import { runOnce } from "../run";
import { withPipelineOptions } from "../utils";
import type { ConfigFlags } from "../utils";

export const defineCommand = (parent: Command) => {
  withPipelineOptions(
    parent
      .command('heal')
      .description('Recreate missing low quality copies and previews without touching raw/')
  ).action((flags: ConfigFlags) => runOnce(flags, { ingest: false }));
}
