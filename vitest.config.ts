import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // pdf.js warms up slowly on a cold start
    testTimeout: 20000,
  },
});
