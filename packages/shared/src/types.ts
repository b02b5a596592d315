import type { Result } from "neverthrow";

export type VideoId = number & { __brand: "archive:VideoId" };

// ============================================================================
// Archive Types
// ============================================================================

/**
 * The four working directories of a library. `hq`, `lq` and `previews` make up
 * the archive; `inbox` holds raw files waiting to be ingested.
 */
export interface ArchiveDirs {
  base: string;
  inbox: string;
  hq: string;
  lq: string;
  previews: string;
}

export type ArtifactKind = 'low-quality' | 'preview';

export interface VideoRecord {
  id: VideoId;
  hqPath: string;
  lqPath: string;
  previewPath: string;
  hasLowQuality: boolean;
  hasPreview: boolean;
}

// ============================================================================
// Collaborator Types
// ============================================================================

export interface TranscodeClient {
  /** Succeeds when the transcoder executable can be started. */
  available(): Promise<Result<void, Error>>;
  derive(kind: ArtifactKind, inputPath: string, outputPath: string): Promise<Result<void, Error>>;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface VersionControlClient {
  /** Porcelain status lines for the given paths, relative to the repository root. */
  status(repoRoot: string, paths: string[]): Promise<Result<string[], Error>>;
  /** Stages additions, changes and deletions under the given paths. */
  stageAll(repoRoot: string, paths: string[]): Promise<Result<CommandOutput, Error>>;
  commit(repoRoot: string, message: string): Promise<Result<CommandOutput, Error>>;
  push(repoRoot: string): Promise<Result<CommandOutput, Error>>;
}

export interface PipelineDeps {
  transcoder: TranscodeClient;
  vcs: VersionControlClient;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface LowQualitySettings {
  crf: number;
  width: number;
  codec: string;
  preset: string;
}

export interface VaultConfig {
  baseDir: string;
  ffmpegPath: string;
  gitPath: string;
  commitMessage: string;
  lowQuality: LowQualitySettings;
}
