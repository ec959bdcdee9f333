import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
    env: {
      JWT_SECRET: "test-secret",
      DATABASE_URL: "postgres://localhost:5432/unused",
    },
  },
});
