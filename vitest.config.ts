import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["tests/**/*.test.ts"],
        // process.chdir() is unavailable inside worker threads
        pool: "forks",
        testTimeout: 15000,
    },
});
