import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["harnessctl/test/**/*.test.ts"],
    testTimeout: 20000,
  },
});
