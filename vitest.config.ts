import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/__tests__/**/*.test.ts"],
        environment: "node",
        // sharp's native addon is not safe to load in worker threads
        pool: "forks",
        testTimeout: 15000,
    },
});
