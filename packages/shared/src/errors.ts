export type PipelineOperation =
  | 'transcoder-check'
  | 'create-directory'
  | 'read-archive'
  | 'read-inbox'
  | 'copy'
  | 'derive-low-quality'
  | 'derive-preview'
  | 'remove-raw'
  | 'vcs-status'
  | 'vcs-stage'
  | 'vcs-commit'
  | 'vcs-push';

const DESCRIPTIONS: Record<PipelineOperation, string> = {
  'transcoder-check': 'Transcoder check failed',
  'create-directory': 'Could not create directory',
  'read-archive': 'Could not read archive',
  'read-inbox': 'Could not read inbox',
  'copy': 'Copy failed',
  'derive-low-quality': 'Low quality transcode failed',
  'derive-preview': 'Preview extraction failed',
  'remove-raw': 'Could not remove raw file',
  'vcs-status': 'git status failed',
  'vcs-stage': 'git add failed',
  'vcs-commit': 'git commit failed',
  'vcs-push': 'git push failed',
};

/**
 * An error raised by one step of the pipeline, tied to the file it was working on.
 */
export class PipelineError extends Error {
  readonly operation: PipelineOperation;
  readonly path: string;

  constructor(operation: PipelineOperation, path: string, cause: Error) {
    super(`${DESCRIPTIONS[operation]} (${path}): ${cause.message}`, { cause });
    this.name = 'PipelineError';
    this.operation = operation;
    this.path = path;
  }
}
