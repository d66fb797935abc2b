import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { rateLimiter } from "./middleware/rate-limit.js";
import { cacheHeaders } from "./middleware/cache-headers.js";
import { errorHandler } from "./middleware/error-handler.js";
import { qr } from "./routes/qr.js";
import { docs } from "./routes/docs.js";

export const app = new Hono();

app.use("*", logger());
app.use("*", cors());
app.use("*", rateLimiter);
app.use("*", cacheHeaders);

app.onError(errorHandler);

app.route("/", docs);
app.route("/qr", qr);

app.get("/health", (c) => c.json({ status: "ok" }));
