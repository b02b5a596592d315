import { err, ok, Result } from "neverthrow";
import type { CommandOutput, VersionControlClient } from "../types";
import type { PipelineOperation } from "../errors";
import type { PipelineOptions } from "../log";
import { PipelineError } from "../errors";
import { logFor } from "../log";
import { paths } from "../paths";

export type PublishOutcome = 'published' | 'skipped';

type PublishStep = {
  operation: PipelineOperation;
  label: string;
  run: () => Promise<Result<CommandOutput, Error>>;
};

/**
 * True when git reports untracked, modified or deleted entries in the archive
 * directories. A failing status check counts as clean, so the caller's own
 * change flag decides.
 */
export const archiveDirty = async (repoRoot: string, vcs: VersionControlClient, options: PipelineOptions = {}): Promise<boolean> => {
  const statusRes = await vcs.status(repoRoot, paths.archiveRelative());
  if (statusRes.isErr()) {
    const failure = new PipelineError('vcs-status', repoRoot, statusRes.error);
    logFor(options).warn(`${failure.message}. Relying on this run's changes only.`);
    return false;
  }
  return statusRes.value.length > 0;
}

/**
 * Stages the archive directories, commits and pushes when this run changed
 * something or the working tree has pending archive changes from an earlier
 * run. The inbox is never staged.
 *
 * Steps stop at the first failure. Whatever git already did is left in place.
 */
export const publish = async (
  repoRoot: string,
  commitMessage: string,
  changed: boolean,
  vcs: VersionControlClient,
  options: PipelineOptions = {}
): Promise<Result<PublishOutcome, PipelineError>> => {
  const log = logFor(options);

  if (!changed && !await archiveDirty(repoRoot, vcs, options)) {
    log.info('Nothing changed, skipping publish.');
    return ok('skipped');
  }

  const steps: PublishStep[] = [
    { operation: 'vcs-stage', label: 'Staging changes', run: () => vcs.stageAll(repoRoot, paths.archiveRelative()) },
    { operation: 'vcs-commit', label: 'Committing', run: () => vcs.commit(repoRoot, commitMessage) },
    { operation: 'vcs-push', label: 'Pushing', run: () => vcs.push(repoRoot) },
  ];

  for (const step of steps) {
    options.spinner?.start(`${step.label}...`);
    const res = await step.run();
    if (res.isErr()) {
      const failure = new PipelineError(step.operation, repoRoot, res.error);
      log.fail(failure.message);
      log.warn(`Publish stopped. The repository in ${repoRoot} may be partially staged or committed and needs a manual look.`);
      return err(failure);
    }
  }

  log.success(`Published library: "${commitMessage}"`);
  return ok('published');
}
