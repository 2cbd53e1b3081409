import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["relpack/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 30000,
  },
});
