import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["tools/src/**/*.test.ts"],
  },
})
