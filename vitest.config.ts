// vitest.config.ts — Unit and harness test configuration

import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 10_000,
    pool: "forks",
  },
})
