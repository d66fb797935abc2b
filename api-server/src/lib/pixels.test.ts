import { describe, it, expect } from "vitest";
import { imageToPixelRows, imageToPixelString, countDarkPixels } from "./pixels.js";
import { compose } from "./compose.js";
import { PixelSurface } from "./surface.js";

function diagonal() {
    const surface = PixelSurface.create(3, 3);
    surface.setDark(0, 0);
    surface.setDark(2, 1);
    surface.setDark(1, 2);
    return compose(surface);
}

describe("imageToPixelRows", () => {
    it("restores pixel rows including the half row", () => {
        expect(imageToPixelRows(diagonal())).toEqual([
            ["dark", "light", "light"],
            ["light", "light", "dark"],
            ["light", "dark", "light"],
        ]);
    });
});

describe("imageToPixelString", () => {
    it("writes one line of 0s and 1s per pixel row", () => {
        expect(imageToPixelString(diagonal())).toBe("100\n001\n010");
    });

    it("is empty for an empty image", () => {
        expect(imageToPixelString(compose(PixelSurface.create(0, 0)))).toBe("");
    });
});

describe("countDarkPixels", () => {
    it("counts dark pixels in full and half rows", () => {
        expect(countDarkPixels(diagonal())).toBe(3);
    });
});
