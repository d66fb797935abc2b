import type { ErrorHandler } from "hono";
import { QrEncodeError } from "../lib/qr.js";

export const errorHandler: ErrorHandler = (err, c) => {
    if (err instanceof QrEncodeError) {
        return c.json({ error: `Cannot encode data: ${err.message}` }, 422);
    }

    console.error(`[ERROR] ${c.req.method} ${c.req.path}:`, err);
    return c.json({ error: "Internal server error" }, 500);
};
