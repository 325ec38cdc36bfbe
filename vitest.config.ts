import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts", "tests/**/*.test.tsx"],
    exclude: ["node_modules", "dist"],

    sequence: {
      shuffle: false,
    },

    testTimeout: 10000,

    // Global setup file
    setupFiles: ["./tests/setup.ts"],

    // Ink component tests write to a shared fake stdin
    isolate: true,
    pool: "forks",
  },
});
