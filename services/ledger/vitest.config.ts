import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: [
        "src/domain/**/*.ts",
        "src/services/**/*Live.ts",
        "src/api/**/*.ts"
      ],
      exclude: [
        "src/**/*.test.ts",
        "src/__tests__/**",
        "src/server.ts",
        "src/db.ts",
        "src/layers.ts",
        "src/telemetry.ts"
      ]
    }
  }
})
