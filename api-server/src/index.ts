import { serve } from "@hono/node-server";
import { PORT } from "./config.js";
import { app } from "./app.js";

console.log(`termqr API server starting on http://localhost:${PORT}`);
serve({ fetch: app.fetch, port: PORT });
