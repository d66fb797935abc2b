import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["api-server/src/**/*.test.ts"],
        environment: "node",
    },
});
