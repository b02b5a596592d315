import { describe, it, expect } from "vitest";
import { resolveConfig, getDefaultConfig } from "../index";

const CWD = "/home/editor/videos";

describe("resolveConfig", () => {
    it("falls back to the defaults", () => {
        const config = resolveConfig({}, {}, CWD)._unsafeUnwrap();

        expect(config).toEqual(getDefaultConfig(CWD));
        expect(config).toEqual({
            baseDir: CWD,
            ffmpegPath: 'ffmpeg',
            gitPath: 'git',
            commitMessage: 'Update video library',
            lowQuality: { crf: 28, width: 640, codec: 'libx264', preset: 'medium' },
        });
    });

    it("reads the environment", () => {
        const config = resolveConfig({}, {
            VIDVAULT_DIR: '/mnt/library',
            VIDVAULT_FFMPEG: '/usr/local/bin/ffmpeg',
            VIDVAULT_COMMIT_MESSAGE: 'Nightly sync',
            VIDVAULT_LQ_CRF: '23',
            VIDVAULT_LQ_WIDTH: '854',
        }, CWD)._unsafeUnwrap();

        expect(config.baseDir).toBe('/mnt/library');
        expect(config.ffmpegPath).toBe('/usr/local/bin/ffmpeg');
        expect(config.commitMessage).toBe('Nightly sync');
        expect(config.lowQuality).toEqual({ crf: 23, width: 854, codec: 'libx264', preset: 'medium' });
    });

    it("prefers flags over the environment", () => {
        const config = resolveConfig(
            { crf: '18', message: 'Manual run' },
            { VIDVAULT_LQ_CRF: '23', VIDVAULT_COMMIT_MESSAGE: 'Nightly sync' },
            CWD
        )._unsafeUnwrap();

        expect(config.lowQuality.crf).toBe(18);
        expect(config.commitMessage).toBe('Manual run');
    });

    it("ignores empty environment values", () => {
        const config = resolveConfig({}, { VIDVAULT_FFMPEG: '' }, CWD)._unsafeUnwrap();

        expect(config.ffmpegPath).toBe('ffmpeg');
    });

    it("rejects an out of range compression factor", () => {
        const res = resolveConfig({ crf: '60' }, {}, CWD);

        expect(res._unsafeUnwrapErr().message).toBe(
            'Invalid configuration. lowQuality.crf: Number must be less than or equal to 51'
        );
    });

    it("rejects an odd width", () => {
        const res = resolveConfig({ width: '641' }, {}, CWD);

        expect(res._unsafeUnwrapErr().message).toBe(
            'Invalid configuration. lowQuality.width: width must be an even number of pixels'
        );
    });

    it("rejects a blank commit message", () => {
        const res = resolveConfig({ message: '   ' }, {}, CWD);

        expect(res._unsafeUnwrapErr().message).toBe(
            'Invalid configuration. commitMessage: commit message must not be empty'
        );
    });
});
