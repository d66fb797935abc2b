import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

// content/ sits next to src/ and dist/, so the same path works from either
export function readContent(name: string): string {
    return readFileSync(resolve(__dirname, "../../content", name), "utf-8");
}
