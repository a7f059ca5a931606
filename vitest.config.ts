import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["tests/**/*.test.ts"],
        // Config and SDK tests rewrite PATCHWORK_* env vars
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
    },
});
