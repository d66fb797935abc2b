#!/usr/bin/env node
import { buffer } from "node:stream/consumers";
import { runRender } from "./commands/render.js";

runRender(process.argv.slice(2), {
    readStdin: () => buffer(process.stdin),
    write: (chunk) => {
        process.stdout.write(chunk);
    },
}).catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
