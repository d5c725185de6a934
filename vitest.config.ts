import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/src/**/*.test.ts", "lib/**/*.test.ts"],
    restoreMocks: true,
  },
})
