// vitest.config.mts
import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",

        // Source-level unit tests and the cross-module suites
        include: [
            "src/**/*.test.ts",
            "tests/__tests__/**/*.test.ts",
        ],

        exclude: ["dist/**", "node_modules/**"],
    },
});
