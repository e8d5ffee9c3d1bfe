import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@core$/, replacement: fromRoot("./src/core/index.ts") },
      { find: /^@domain\//, replacement: fromRoot("./src/core/domain/") },
      { find: /^@services\//, replacement: fromRoot("./src/core/services/") },
      { find: /^@lib\//, replacement: fromRoot("./src/core/lib/") },
      { find: /^@cli\//, replacement: fromRoot("./src/cli/") },
      { find: /^@test\//, replacement: fromRoot("./src/test/") },
    ],
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
})
