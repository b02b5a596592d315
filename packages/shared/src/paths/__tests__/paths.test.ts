import { describe, it, expect } from "vitest";
import * as path from "path";
import { paths } from "../index";
import type { VideoId } from "../../types";

describe("paths", () => {
    const dirs = paths.dirs("/srv/library");

    it("lays out the four working directories under the base", () => {
        expect(dirs).toEqual({
            base: "/srv/library",
            inbox: "/srv/library/raw",
            hq: "/srv/library/vidHQ",
            lq: "/srv/library/vidLQ",
            previews: "/srv/library/previews",
        });
    });

    it("names every artifact after the identifier", () => {
        const id = 12 as VideoId;
        expect(paths.hqVideo(dirs, id, ".MOV")).toBe("/srv/library/vidHQ/12.mov");
        expect(paths.lqVideo(dirs, id)).toBe("/srv/library/vidLQ/12.mp4");
        expect(paths.preview(dirs, id)).toBe("/srv/library/previews/12.jpg");
    });

    it("puts partial files beside their target, hidden, with the same extension", () => {
        expect(paths.partial("/srv/library/vidLQ/12.mp4")).toBe("/srv/library/vidLQ/.12.partial.mp4");
        expect(paths.partial(path.join("previews", "3.jpg"))).toBe(path.join("previews", ".3.partial.jpg"));
    });

    describe("parseId", () => {
        it("reads the identifier from the filename stem", () => {
            expect(paths.parseId("42.mp4")).toBe(42);
            expect(paths.parseId("007.mkv")).toBe(7);
        });

        it("rejects anything that is not a positive integer", () => {
            expect(paths.parseId("0.mp4")).toBeNull();
            expect(paths.parseId("-3.mp4")).toBeNull();
            expect(paths.parseId("1.5.mp4")).toBeNull();
            expect(paths.parseId("clip.mp4")).toBeNull();
            expect(paths.parseId(".4.partial.mp4")).toBeNull();
            expect(paths.parseId("99999999999999999999.mp4")).toBeNull();
        });
    });
});
