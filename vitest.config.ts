import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/src/**/__tests__/**/*.test.ts", "lib/**/__tests__/**/*.test.ts"],
    exclude: ["node_modules", "cache"],
    setupFiles: ["./server/src/__tests__/setup.ts"],
    testTimeout: 10_000,
  },
})
