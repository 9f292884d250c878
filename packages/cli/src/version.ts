import { readFileSync } from "fs"
import { join, dirname } from "path"
import { fileURLToPath } from "url"

import { z } from "zod"

const packageJsonSchema = z.object({ version: z.string() })

/**
 * Gets the version from package.json
 */
export function getLocalVersion(): string {
  const __filename = fileURLToPath(import.meta.url)
  const __dirname = dirname(__filename)

  // Path to package.json relative to this file, from both src/ and the bundled dist/
  const packageJsonPath = join(__dirname, "..", "package.json")

  return packageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, "utf8"))).version
}
