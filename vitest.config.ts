import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "api/tests/**/*.test.ts"],
  },
});
