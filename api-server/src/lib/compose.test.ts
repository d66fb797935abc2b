import { describe, it, expect } from "vitest";
import { compose } from "./compose.js";
import { PixelSurface, SurfaceContractError } from "./surface.js";

function surfaceWith(width: number, height: number, dark: [number, number][]): PixelSurface {
    const surface = PixelSurface.create(width, height);
    for (const [x, y] of dark) surface.setDark(x, y);
    return surface;
}

describe("compose", () => {
    it("pairs vertically adjacent pixels into cells", () => {
        const image = compose(surfaceWith(2, 2, [[0, 0], [1, 1]]));
        expect(image.rows).toEqual([
            [
                { top: "dark", bottom: "light" },
                { top: "light", bottom: "dark" },
            ],
        ]);
        expect(image.halfRow).toBeNull();
    });

    it("turns a single row into a half row only", () => {
        const image = compose(surfaceWith(3, 1, [[1, 0]]));
        expect(image.rows).toEqual([]);
        expect(image.halfRow).toEqual([{ pixel: "light" }, { pixel: "dark" }, { pixel: "light" }]);
    });

    it("appends the unpaired last row after the full rows", () => {
        const image = compose(surfaceWith(1, 3, [[0, 0], [0, 2]]));
        expect(image.rows).toEqual([[{ top: "dark", bottom: "light" }]]);
        expect(image.halfRow).toEqual([{ pixel: "dark" }]);
    });

    it("keeps top-to-bottom row order", () => {
        const image = compose(surfaceWith(1, 5, [[0, 1], [0, 2], [0, 4]]));
        expect(image.rows).toEqual([
            [{ top: "light", bottom: "dark" }],
            [{ top: "dark", bottom: "light" }],
        ]);
        expect(image.halfRow).toEqual([{ pixel: "dark" }]);
    });

    it.each([
        [0, 0],
        [0, 3],
        [4, 0],
    ])("returns an empty image for a %dx%d surface", (width, height) => {
        const image = compose(PixelSurface.create(width, height));
        expect(image.rows).toEqual([]);
        expect(image.halfRow).toBeNull();
        expect(image.width).toBe(width);
        expect(image.height).toBe(height);
    });

    it("gives floor(h/2) light rows and a half row iff h is odd", () => {
        for (let width = 1; width <= 4; width++) {
            for (let height = 0; height <= 7; height++) {
                const image = compose(PixelSurface.create(width, height));
                expect(image.rows).toHaveLength(Math.floor(height / 2));
                for (const row of image.rows) {
                    expect(row).toHaveLength(width);
                    expect(row.every((cell) => cell.top === "light" && cell.bottom === "light")).toBe(true);
                }
                if (height % 2 === 1) {
                    expect(image.halfRow).toHaveLength(width);
                    expect(image.halfRow?.every((cell) => cell.pixel === "light")).toBe(true);
                } else {
                    expect(image.halfRow).toBeNull();
                }
                expect(image.rows.length * 2 + (image.halfRow ? 1 : 0)).toBe(height);
            }
        }
    });

    it("returns a frozen image", () => {
        const image = compose(surfaceWith(2, 3, [[0, 0]]));
        expect(Object.isFrozen(image)).toBe(true);
        expect(Object.isFrozen(image.rows)).toBe(true);
        expect(Object.isFrozen(image.rows[0])).toBe(true);
        expect(Object.isFrozen(image.rows[0][0])).toBe(true);
        expect(Object.isFrozen(image.halfRow)).toBe(true);
    });

    it("consumes the surface", () => {
        const surface = surfaceWith(2, 2, []);
        compose(surface);
        expect(() => surface.setDark(0, 0)).toThrow(SurfaceContractError);
        expect(() => compose(surface)).toThrow(SurfaceContractError);
    });
});
