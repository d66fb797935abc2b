import type { Pixel, PixelSurface } from "./surface.js";

/** Two vertically stacked pixels drawn as one terminal character. */
export interface GlyphCell {
    readonly top: Pixel;
    readonly bottom: Pixel;
}

/** Cell of the trailing row when the surface height is odd. */
export interface HalfGlyphCell {
    readonly pixel: Pixel;
}

export interface RenderedImage {
    readonly width: number;
    readonly height: number;
    readonly rows: readonly (readonly GlyphCell[])[];
    readonly halfRow: readonly HalfGlyphCell[] | null;
}

/**
 * Convert a finished surface into glyph rows, pairing pixel rows (0,1), (2,3), ...
 * An odd final row becomes `halfRow`. The surface is consumed and cannot be
 * written to afterwards.
 */
export function compose(surface: PixelSurface): RenderedImage {
    const { width, height, pixels } = surface.consume();

    if (width === 0 || height === 0) {
        return Object.freeze({ width, height, rows: Object.freeze([]), halfRow: null });
    }

    const rows: (readonly GlyphCell[])[] = [];
    for (let y = 0; y + 1 < height; y += 2) {
        const topStart = y * width;
        const bottomStart = topStart + width;
        const row = new Array<GlyphCell>(width);
        for (let x = 0; x < width; x++) {
            row[x] = Object.freeze({ top: pixels[topStart + x], bottom: pixels[bottomStart + x] });
        }
        rows.push(Object.freeze(row));
    }

    let halfRow: readonly HalfGlyphCell[] | null = null;
    if (height % 2 === 1) {
        const start = (height - 1) * width;
        halfRow = Object.freeze(pixels.slice(start, start + width).map((pixel) => Object.freeze({ pixel })));
    }

    return Object.freeze({ width, height, rows: Object.freeze(rows), halfRow });
}
