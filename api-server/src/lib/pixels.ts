import type { RenderedImage } from "./compose.js";
import type { Pixel } from "./surface.js";

/** Unpack glyph rows back into pixel rows, top to bottom. */
export function imageToPixelRows(image: RenderedImage): Pixel[][] {
    const rows: Pixel[][] = [];
    for (const row of image.rows) {
        rows.push(row.map((cell) => cell.top));
        rows.push(row.map((cell) => cell.bottom));
    }
    if (image.halfRow) {
        rows.push(image.halfRow.map((cell) => cell.pixel));
    }
    return rows;
}

/**
 * One line of 0s and 1s per pixel row (1 = dark), lines joined by "\n".
 */
export function imageToPixelString(image: RenderedImage): string {
    return imageToPixelRows(image)
        .map((row) => row.map((pixel) => (pixel === "dark" ? "1" : "0")).join(""))
        .join("\n");
}

export function countDarkPixels(image: RenderedImage): number {
    let count = 0;
    for (const row of imageToPixelRows(image)) {
        for (const pixel of row) {
            if (pixel === "dark") count++;
        }
    }
    return count;
}
