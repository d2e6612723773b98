import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tools/standardizer/tests/**/*.test.ts"],
    environment: "node",
  },
});
