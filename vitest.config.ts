import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "shared/*/test/**/*.test.ts",
      "interfaces/*/test/**/*.test.ts",
      "apps/*/test/**/*.test.ts",
    ],
    environment: "node",
    pool: "forks",
  },
});
