import type { MiddlewareHandler } from "hono";
import { RATE_LIMIT_WINDOW_MS, RATE_LIMIT_MAX_REQUESTS } from "../config.js";

export interface RateLimitOptions {
    windowMs: number;
    max: number;
    now?: () => number;
}

export function createRateLimiter({ windowMs, max, now = Date.now }: RateLimitOptions): MiddlewareHandler {
    const clients = new Map<string, number[]>();

    // Clean up stale entries every 5 minutes
    setInterval(() => {
        const cutoff = now() - windowMs;
        for (const [key, timestamps] of clients) {
            const active = timestamps.filter((t) => t >= cutoff);
            if (active.length === 0) {
                clients.delete(key);
            } else {
                clients.set(key, active);
            }
        }
    }, 5 * 60_000).unref();

    return async (c, next) => {
        const ip =
            c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ??
            c.req.header("x-real-ip") ??
            "unknown";

        const timestamp = now();
        let timestamps = clients.get(ip);

        if (!timestamps) {
            timestamps = [];
            clients.set(ip, timestamps);
        }

        // Remove timestamps outside the window
        const cutoff = timestamp - windowMs;
        while (timestamps.length > 0 && timestamps[0] < cutoff) {
            timestamps.shift();
        }

        if (timestamps.length >= max) {
            c.header("Retry-After", String(Math.ceil(windowMs / 1000)));
            c.header("X-RateLimit-Limit", String(max));
            c.header("X-RateLimit-Remaining", "0");
            return c.json({ error: "Rate limit exceeded. Try again later." }, 429);
        }

        timestamps.push(timestamp);

        c.header("X-RateLimit-Limit", String(max));
        c.header("X-RateLimit-Remaining", String(max - timestamps.length));

        await next();
    };
}

export const rateLimiter = createRateLimiter({
    windowMs: RATE_LIMIT_WINDOW_MS,
    max: RATE_LIMIT_MAX_REQUESTS,
});
