import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/**/src/**/*.test.ts", "packages/**/src/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "**/dist/**"],
    testTimeout: 30_000,
    hookTimeout: 30_000
  }
});
