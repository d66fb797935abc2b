import { Hono, type Context } from "hono";
import { parseQrRequest, type QrRequest } from "../lib/validation.js";
import { getRenderedQr } from "../services/qr-image.js";
import { renderText } from "../lib/glyphs.js";
import { imageToPixelString, countDarkPixels } from "../lib/pixels.js";
import { renderSvg } from "../lib/svg.js";
import { svgToPng } from "../lib/png.js";

const qr = new Hono();

function queryRequest(c: Context, data = c.req.query("data")): { request: QrRequest } | { error: string } {
    return parseQrRequest({ data, ec: c.req.query("ec"), quiet: c.req.query("quiet") });
}

qr.get("/text", (c) => {
    const result = queryRequest(c);
    if ("error" in result) return c.json({ error: result.error }, 400);

    const { image } = getRenderedQr(result.request);
    return c.text(renderText(image));
});

// Raw body is the data, as when piping into the CLI
qr.post("/text", async (c) => {
    const result = queryRequest(c, await c.req.text());
    if ("error" in result) return c.json({ error: result.error }, 400);

    const { image } = getRenderedQr(result.request);
    return c.text(renderText(image));
});

qr.get("/pixels", (c) => {
    const result = queryRequest(c);
    if ("error" in result) return c.json({ error: result.error }, 400);

    const { image } = getRenderedQr(result.request);
    return c.text(imageToPixelString(image));
});

qr.get("/image.svg", (c) => {
    const result = queryRequest(c);
    if ("error" in result) return c.json({ error: result.error }, 400);

    const { image } = getRenderedQr(result.request);
    return c.body(renderSvg(image), 200, { "Content-Type": "image/svg+xml" });
});

qr.get("/image.png", (c) => {
    const result = queryRequest(c);
    if ("error" in result) return c.json({ error: result.error }, 400);

    const { image } = getRenderedQr(result.request);
    const png = svgToPng(renderSvg(image));
    return new Response(png, { status: 200, headers: { "Content-Type": "image/png" } });
});

qr.get("/info", (c) => {
    const result = queryRequest(c);
    if ("error" in result) return c.json({ error: result.error }, 400);

    const { image, version, moduleCount, errorCorrectionLevel, quietZone } = getRenderedQr(result.request);
    return c.json({
        version,
        errorCorrectionLevel,
        quietZone,
        moduleCount,
        width: image.width,
        height: image.height,
        glyphRows: image.rows.length,
        hasHalfRow: image.halfRow !== null,
        darkPixels: countDarkPixels(image),
    });
});

export { qr };
