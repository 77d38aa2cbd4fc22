import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
    include: ["__tests__/unit/**/*.test.ts", "__tests__/integration/**/*.test.ts"],
  },
})
