import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["ts/src/__tests__/**/*.test.ts", "example/ts/src/__tests__/**/*.test.ts"],
  },
});
