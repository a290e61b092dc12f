import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["monitor/src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
