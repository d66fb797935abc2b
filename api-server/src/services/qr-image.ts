import { renderQr, type RenderedQr } from "../lib/qr.js";
import type { QrRequest } from "../lib/validation.js";
import { renderedQrCache } from "./cache.js";

function cacheKey({ data, errorCorrectionLevel, quietZone }: QrRequest): string {
    return `${errorCorrectionLevel}:${quietZone}:${data}`;
}

/** Rendered images are frozen, so cached entries are shared between requests. */
export function getRenderedQr(request: QrRequest): RenderedQr {
    const key = cacheKey(request);
    const cached = renderedQrCache.get(key);
    if (cached) return cached;

    const rendered = renderQr(request.data, request);
    renderedQrCache.set(key, rendered);
    return rendered;
}
