import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["decorators/tests/**/*.test.ts"],
    environment: "node",
  },
});
