import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/_tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
    },
  },
});
