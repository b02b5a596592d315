import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "events";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));
vi.mock("child_process", () => ({ spawn: spawnMock }));

import { createGitClient, parsePorcelain } from "../git";

const fakeChild = (code: number, stdout = '', stderr = '') => {
    const child = Object.assign(new EventEmitter(), {
        stdout: new EventEmitter(),
        stderr: new EventEmitter()
    });
    setImmediate(() => {
        if (stdout) child.stdout.emit('data', Buffer.from(stdout));
        if (stderr) child.stderr.emit('data', Buffer.from(stderr));
        child.emit('close', code);
    });
    return child;
}

describe("parsePorcelain", () => {
    it("keeps one entry per changed path", () => {
        expect(parsePorcelain("?? vidHQ/4.mp4\n M previews/1.jpg\n D vidLQ/2.mp4\n")).toEqual([
            "?? vidHQ/4.mp4",
            " M previews/1.jpg",
            " D vidLQ/2.mp4",
        ]);
    });

    it("is empty for a clean tree", () => {
        expect(parsePorcelain("")).toEqual([]);
    });
});

describe("createGitClient", () => {
    beforeEach(() => {
        spawnMock.mockReset();
    });

    it("asks for the status of the given paths only", async () => {
        spawnMock.mockImplementation(() => fakeChild(0, "?? vidHQ/4.mp4\n"));
        const client = createGitClient();

        const res = await client.status('/srv/library', ['vidHQ', 'vidLQ']);

        expect(res._unsafeUnwrap()).toEqual(["?? vidHQ/4.mp4"]);
        expect(spawnMock).toHaveBeenCalledWith(
            'git',
            ['status', '--porcelain', '--untracked-files=all', '--', 'vidHQ', 'vidLQ'],
            { cwd: '/srv/library', stdio: ['ignore', 'pipe', 'pipe'] }
        );
    });

    it("stages, commits and pushes from the repository root", async () => {
        spawnMock.mockImplementation(() => fakeChild(0));
        const client = createGitClient('/usr/bin/git');

        await client.stageAll('/srv/library', ['vidHQ', 'vidLQ', 'previews']);
        await client.commit('/srv/library', 'Update video library');
        await client.push('/srv/library');

        expect(spawnMock.mock.calls.map(call => call[1])).toEqual([
            ['add', '--all', '--', 'vidHQ', 'vidLQ', 'previews'],
            ['commit', '-m', 'Update video library'],
            ['push'],
        ]);
        expect(spawnMock.mock.calls[0][0]).toBe('/usr/bin/git');
    });

    it("turns a non-zero exit into an error carrying git's output", async () => {
        spawnMock.mockImplementation(() => fakeChild(1, '', 'fatal: not a git repository\n'));
        const client = createGitClient();

        const res = await client.commit('/srv/library', 'Update');

        expect(res._unsafeUnwrapErr().message).toBe('git commit exited with code 1: fatal: not a git repository');
    });

    it("falls back to stdout when stderr is empty", async () => {
        spawnMock.mockImplementation(() => fakeChild(1, 'nothing to commit, working tree clean\n'));
        const client = createGitClient();

        const res = await client.commit('/srv/library', 'Update');

        expect(res._unsafeUnwrapErr().message).toBe('git commit exited with code 1: nothing to commit, working tree clean');
    });
});
