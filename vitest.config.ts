import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // Every test drives a manual clock, so nothing here should ever wait.
    testTimeout: 2_000,
  },
});
