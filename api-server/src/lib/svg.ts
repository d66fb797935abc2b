import { SVG_MODULE_SIZE, BG_COLOR, PIXEL_COLOR } from "../config.js";
import type { RenderedImage } from "./compose.js";
import { imageToPixelRows } from "./pixels.js";

/**
 * Generate SVG from a rendered image.
 * - viewBox="0 0 w h", width/height scaled by SVG_MODULE_SIZE
 * - shape-rendering="crispEdges"
 * - Background rect, dark pixel rects
 * - Row-scan RLE: consecutive dark pixels merged into wider rects
 */
export function renderSvg(image: RenderedImage): string {
    const { width, height } = image;
    const parts: string[] = [];

    parts.push(
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width * SVG_MODULE_SIZE}" height="${height * SVG_MODULE_SIZE}" viewBox="0 0 ${width} ${height}" shape-rendering="crispEdges">`
    );
    parts.push(`<rect width="${width}" height="${height}" fill="${BG_COLOR}"/>`);

    const rows = imageToPixelRows(image);
    for (let y = 0; y < rows.length; y++) {
        const row = rows[y];
        let x = 0;
        while (x < row.length) {
            if (row[x] === "dark") {
                const runStart = x;
                x++;
                while (x < row.length && row[x] === "dark") {
                    x++;
                }
                parts.push(
                    `<rect x="${runStart}" y="${y}" width="${x - runStart}" height="1" fill="${PIXEL_COLOR}"/>`
                );
            } else {
                x++;
            }
        }
    }

    parts.push("</svg>");
    return parts.join("");
}
