import { LRUCache } from "lru-cache";
import { CACHE_MAX_ENTRIES, CACHE_TTL_MS } from "../config.js";
import type { RenderedQr } from "../lib/qr.js";

export const renderedQrCache = new LRUCache<string, RenderedQr>({
    max: CACHE_MAX_ENTRIES,
    ttl: CACHE_TTL_MS,
});
