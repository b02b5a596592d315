import { z } from "zod";
import { err, ok, Result } from "neverthrow";
import type { VaultConfig } from "../types";

/**
 * Values as they arrive from command-line flags. Anything left undefined falls
 * back to the environment, then to the defaults.
 */
export interface ConfigInput {
  dir?: string;
  ffmpeg?: string;
  git?: string;
  message?: string;
  crf?: string;
  width?: string;
  codec?: string;
  preset?: string;
}

export const ENV = {
  dir: 'VIDVAULT_DIR',
  ffmpeg: 'VIDVAULT_FFMPEG',
  git: 'VIDVAULT_GIT',
  message: 'VIDVAULT_COMMIT_MESSAGE',
  crf: 'VIDVAULT_LQ_CRF',
  width: 'VIDVAULT_LQ_WIDTH',
  codec: 'VIDVAULT_LQ_CODEC',
  preset: 'VIDVAULT_LQ_PRESET',
} satisfies Record<keyof ConfigInput, string>;

export const getDefaultConfig = (cwd: string = process.cwd()): VaultConfig => ({
  baseDir: cwd,
  ffmpegPath: 'ffmpeg',
  gitPath: 'git',
  commitMessage: 'Update video library',
  lowQuality: {
    crf: 28,
    width: 640,
    codec: 'libx264',
    preset: 'medium',
  },
});

const configSchema = z.object({
  baseDir: z.string().min(1, "base directory must not be empty"),
  ffmpegPath: z.string().min(1, "transcoder path must not be empty"),
  gitPath: z.string().min(1, "git path must not be empty"),
  commitMessage: z.string().trim().min(1, "commit message must not be empty"),
  lowQuality: z.object({
    // ffmpeg's CRF scale for x264/x265; lower is better quality
    crf: z.coerce.number().int().min(0).max(51),
    width: z.coerce.number().int().positive().refine(w => w % 2 === 0, "width must be an even number of pixels"),
    codec: z.string().min(1),
    preset: z.string().min(1),
  }),
});

const pick = (flag: string | undefined, envName: string, env: NodeJS.ProcessEnv): string | undefined => {
  if (flag !== undefined) return flag;
  const fromEnv = env[envName];
  return fromEnv !== undefined && fromEnv !== '' ? fromEnv : undefined;
}

export const resolveConfig = (
  input: ConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Result<VaultConfig, Error> => {
  const defaults = getDefaultConfig(cwd);
  const value = (key: keyof ConfigInput) => pick(input[key], ENV[key], env);

  const parsed = configSchema.safeParse({
    baseDir: value('dir') ?? defaults.baseDir,
    ffmpegPath: value('ffmpeg') ?? defaults.ffmpegPath,
    gitPath: value('git') ?? defaults.gitPath,
    commitMessage: value('message') ?? defaults.commitMessage,
    lowQuality: {
      crf: value('crf') ?? defaults.lowQuality.crf,
      width: value('width') ?? defaults.lowQuality.width,
      codec: value('codec') ?? defaults.lowQuality.codec,
      preset: value('preset') ?? defaults.lowQuality.preset,
    },
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    return err(new Error(`Invalid configuration. ${issues.join('; ')}`));
  }

  return ok(parsed.data);
}

export const config = {
  defaults: getDefaultConfig,
  resolve: resolveConfig,
}
