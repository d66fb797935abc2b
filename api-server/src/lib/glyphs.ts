import type { GlyphCell, HalfGlyphCell, RenderedImage } from "./compose.js";

// Dark reads as filled, so output looks right as dark text on a light background.
export const GLYPHS = {
    full: "█",
    upper: "▀",
    lower: "▄",
    blank: " ",
} as const;

export type Glyph = (typeof GLYPHS)[keyof typeof GLYPHS];

export function cellToChar(cell: GlyphCell): Glyph {
    if (cell.top === "dark") {
        return cell.bottom === "dark" ? GLYPHS.full : GLYPHS.upper;
    }
    return cell.bottom === "dark" ? GLYPHS.lower : GLYPHS.blank;
}

/**
 * A lone final row has no partner below it, so a dark pixel always takes the
 * upper half of the cell.
 */
export function halfCellToChar(cell: HalfGlyphCell): Glyph {
    return cell.pixel === "dark" ? GLYPHS.upper : GLYPHS.blank;
}

export function renderLines(image: RenderedImage): string[] {
    const lines = image.rows.map((row) => row.map(cellToChar).join(""));
    if (image.halfRow) {
        lines.push(image.halfRow.map(halfCellToChar).join(""));
    }
    return lines;
}

/** Terminal output: every line, half row included, ends with a newline. */
export function renderText(image: RenderedImage): string {
    return renderLines(image)
        .map((line) => `${line}\n`)
        .join("");
}
