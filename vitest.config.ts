import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/*/tests/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "packages/*/*/tests/runtime/*.ts"],
  },
});
