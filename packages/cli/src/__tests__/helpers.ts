import { vi } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { ok, Result } from "neverthrow";
import type { ArtifactKind, CommandOutput } from "@vidvault/shared";

export const createBase = () => fs.mkdtemp(path.join(os.tmpdir(), 'vidvault-cli-'));

export const removeBase = (base: string) => fs.rm(base, { recursive: true, force: true });

export const touch = async (p: string) => {
    await fs.mkdir(path.dirname(p), { recursive: true });
    await fs.writeFile(p, path.basename(p));
}

export const listDir = async (dir: string) => (await fs.readdir(dir)).sort();

const ANSI = /\x1b\[[0-9;]*m/g;

export const stripAnsi = (s: string) => s.replace(ANSI, '');

/** Every line passed to a console spy, colors removed. */
export const printed = (spy: { mock: { calls: unknown[][] } }) =>
    spy.mock.calls.map(args => stripAnsi(args.map(String).join(' ')));

export const fakeDeps = () => ({
    transcoder: {
        available: vi.fn(async (): Promise<Result<void, Error>> => ok(undefined)),
        derive: vi.fn(async (kind: ArtifactKind, _inputPath: string, outputPath: string): Promise<Result<void, Error>> => {
            await fs.writeFile(outputPath, kind);
            return ok(undefined);
        }),
    },
    vcs: {
        status: vi.fn(async (_root: string, _paths: string[]): Promise<Result<string[], Error>> => ok([])),
        stageAll: vi.fn(async (_root: string, _paths: string[]): Promise<Result<CommandOutput, Error>> => ok({ stdout: '', stderr: '' })),
        commit: vi.fn(async (_root: string, _message: string): Promise<Result<CommandOutput, Error>> => ok({ stdout: '', stderr: '' })),
        push: vi.fn(async (_root: string): Promise<Result<CommandOutput, Error>> => ok({ stdout: '', stderr: '' })),
    },
});
