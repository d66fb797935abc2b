import { Resvg } from "@resvg/resvg-js";
import { PNG_OUTPUT_SIZE } from "../config.js";

export function svgToPng(svg: string, width: number = PNG_OUTPUT_SIZE): Uint8Array {
    const resvg = new Resvg(svg, {
        fitTo: { mode: "width", value: width },
    });
    const rendered = resvg.render();
    return new Uint8Array(rendered.asPng());
}
