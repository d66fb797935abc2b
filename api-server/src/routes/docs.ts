import { Hono } from "hono";
import { readContent } from "../lib/content.js";

const docs = new Hono();

const html = readContent("docs.html");
const llms = readContent("llms.txt");

docs.get("/", (c) => c.html(html));

docs.get("/llms.txt", (c) => c.text(llms));

export { docs };
