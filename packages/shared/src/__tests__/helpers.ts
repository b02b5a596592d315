import { vi } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { err, ok, Result } from "neverthrow";
import type { ArchiveDirs, ArtifactKind, CommandOutput } from "../types";
import { paths } from "../paths";

export const createLibrary = async (): Promise<ArchiveDirs> => {
    const base = await fs.mkdtemp(path.join(os.tmpdir(), 'vidvault-test-'));
    const dirs = paths.dirs(base);
    for (const dir of [dirs.inbox, dirs.hq, dirs.lq, dirs.previews]) {
        await fs.mkdir(dir, { recursive: true });
    }
    return dirs;
}

export const removeLibrary = (dirs: ArchiveDirs) => fs.rm(dirs.base, { recursive: true, force: true });

/** Writes a small file. Contents default to the file name, so different names never compare equal. */
export const touch = (p: string, content = path.basename(p)) => fs.writeFile(p, content);

export const exists = async (p: string) => {
    try {
        await fs.access(p);
        return true;
    } catch {
        return false;
    }
}

export const listDir = async (dir: string) => (await fs.readdir(dir)).sort();

type FailWhen = (kind: ArtifactKind, inputPath: string) => boolean;

/**
 * Transcoder stand-in that writes a small text file wherever ffmpeg would have
 * written its output.
 */
export const fakeTranscoder = (failWhen: FailWhen = () => false) => ({
    available: vi.fn(async (): Promise<Result<void, Error>> => ok(undefined)),
    derive: vi.fn(async (kind: ArtifactKind, inputPath: string, outputPath: string): Promise<Result<void, Error>> => {
        if (failWhen(kind, inputPath)) {
            return err(new Error(`ffmpeg exited with code 1`));
        }
        await fs.writeFile(outputPath, `${kind} from ${path.basename(inputPath)}`);
        return ok(undefined);
    }),
});

const done = async (): Promise<Result<CommandOutput, Error>> => ok({ stdout: '', stderr: '' });

export const fakeVcs = (statusLines: string[] = []) => ({
    status: vi.fn(async (_root: string, _paths: string[]): Promise<Result<string[], Error>> => ok(statusLines)),
    stageAll: vi.fn((_root: string, _paths: string[]) => done()),
    commit: vi.fn((_root: string, _message: string) => done()),
    push: vi.fn((_root: string) => done()),
});
