import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "path";
import type { ArchiveDirs } from "../../types";
import { archive } from "../index";
import { createLibrary, removeLibrary, touch } from "../../__tests__/helpers";

describe("archive", () => {
    let dirs: ArchiveDirs;

    beforeEach(async () => {
        dirs = await createLibrary();
    });

    afterEach(async () => {
        await removeLibrary(dirs);
    });

    it("builds a record per archived video with its artifact state", async () => {
        await touch(path.join(dirs.hq, '2.mov'));
        await touch(path.join(dirs.hq, '1.mp4'));
        await touch(path.join(dirs.lq, '1.mp4'));
        await touch(path.join(dirs.previews, '1.jpg'));
        await touch(path.join(dirs.previews, '2.jpg'));

        const records = (await archive.records(dirs))._unsafeUnwrap();

        expect(records).toEqual([
            {
                id: 1,
                hqPath: path.join(dirs.hq, '1.mp4'),
                lqPath: path.join(dirs.lq, '1.mp4'),
                previewPath: path.join(dirs.previews, '1.jpg'),
                hasLowQuality: true,
                hasPreview: true,
            },
            {
                id: 2,
                hqPath: path.join(dirs.hq, '2.mov'),
                lqPath: path.join(dirs.lq, '2.mp4'),
                previewPath: path.join(dirs.previews, '2.jpg'),
                hasLowQuality: false,
                hasPreview: true,
            },
        ]);
        expect(archive.incomplete(records).map(r => r.id)).toEqual([2]);
    });

    it("ignores derived artifacts without an archive copy", async () => {
        await touch(path.join(dirs.lq, '5.mp4'));

        expect((await archive.records(dirs))._unsafeUnwrap()).toEqual([]);
    });
});
