import path from "path"
import { fileURLToPath } from "url"

import { defineConfig } from "vitest/config"

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@ferrule\/core\/(.*)$/, replacement: `${root}/packages/core/src/$1` },
      { find: /^@ferrule\/cli\/(.*)$/, replacement: `${root}/packages/cli/src/$1` },
    ],
  },
  test: {
    include: ["packages/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
})
