import type { MiddlewareHandler } from "hono";

export const cacheHeaders: MiddlewareHandler = async (c, next) => {
    await next();
    if (c.req.method !== "GET" || c.res.status < 200 || c.res.status >= 300) return;

    const path = c.req.path;
    if (path.startsWith("/qr/")) {
        // Same query always renders the same output
        c.header("Cache-Control", "public, max-age=86400, immutable");
    } else if (path === "/" || path === "/llms.txt") {
        c.header("Cache-Control", "public, max-age=300");
    }
};
