import fs from "fs"

import { ConfigError, errorMessage } from "@ferrule/core/errors"

/**
 * Run from another directory, so that relative paths and `.ferrule.json` resolve there.
 */
export function switchContext(contextDir: string): void {
  let stats: fs.Stats
  try {
    stats = fs.statSync(contextDir)
  } catch (error) {
    throw new ConfigError(`Cannot access directory '${contextDir}': ${errorMessage(error)}`)
  }

  if (!stats.isDirectory()) {
    throw new ConfigError(`'${contextDir}' is not a directory`)
  }

  process.chdir(contextDir)
}
