import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"]
  },
  resolve: {
    alias: [
      { find: /^cache-statistics\/test\//, replacement: fileURLToPath(new URL("./test/", import.meta.url)) },
      { find: /^cache-statistics\//, replacement: fileURLToPath(new URL("./src/", import.meta.url)) }
    ]
  }
})
