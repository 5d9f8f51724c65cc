import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["typescript/packages/**/test/**/*.test.ts", "e2e/**/*.test.ts"],
    environment: "node",
  },
});
