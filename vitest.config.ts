// vitest.config.ts — unit + HTTP surface tests (all in-process)
import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 15_000,
    pool: "forks",
  },
})
