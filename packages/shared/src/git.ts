import { spawn } from 'child_process';
import { ok, err, Result } from 'neverthrow';
import type { CommandOutput, VersionControlClient } from './types';

const runGit = (executable: string, cwd: string, args: string[]): Promise<Result<CommandOutput, Error>> => {
  return new Promise((resolve) => {
    const child = spawn(executable, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve(ok({ stdout, stderr }));
      } else {
        const detail = (stderr || stdout).trim();
        resolve(err(new Error(`git ${args[0]} exited with code ${code}${detail ? `: ${detail}` : ''}`)));
      }
    });

    child.on('error', (error) => {
      resolve(err(error));
    });
  });
};

/**
 * Splits `git status --porcelain` output into its non-empty entry lines.
 */
export const parsePorcelain = (stdout: string): string[] =>
  stdout.split('\n').map(line => line.trimEnd()).filter(line => line.length > 0);

export const createGitClient = (executable = 'git'): VersionControlClient => ({
  status: async (repoRoot, paths) => {
    const res = await runGit(executable, repoRoot, ['status', '--porcelain', '--untracked-files=all', '--', ...paths]);
    return res.map(output => parsePorcelain(output.stdout));
  },
  stageAll: (repoRoot, paths) => runGit(executable, repoRoot, ['add', '--all', '--', ...paths]),
  commit: (repoRoot, message) => runGit(executable, repoRoot, ['commit', '-m', message]),
  push: (repoRoot) => runGit(executable, repoRoot, ['push']),
});

export const git = {
  createGitClient,
  parsePorcelain
};
