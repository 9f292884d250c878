import fs from "fs"
import path from "path"

import { errorMessage, IoError } from "@ferrule/core/errors"
import { minimatch } from "minimatch"

// Directories never searched for sources
const SKIPPED_DIRECTORIES = new Set([".git", "target", "node_modules"])

/**
 * Read `.gitignore` patterns from a directory. Negated patterns are not supported and dropped.
 */
export function readGitignore(dir: string): string[] {
  const gitignorePath = path.join(dir, ".gitignore")
  if (!fs.existsSync(gitignorePath)) return []

  return fs
    .readFileSync(gitignorePath, "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#") && !line.startsWith("!"))
}

function matchesGitignore(relativePath: string, pattern: string): boolean {
  const directoryPattern = pattern.replace(/\/+$/, "")
  const anchored = directoryPattern.startsWith("/") || directoryPattern.includes("/")
  const glob = directoryPattern.replace(/^\/+/, "")

  if (anchored) {
    return (
      minimatch(relativePath, glob, { dot: true }) ||
      minimatch(relativePath, `${glob}/**`, { dot: true })
    )
  }

  return relativePath.split("/").some((segment) => minimatch(segment, glob, { dot: true }))
}

/**
 * Whether a path relative to the search root is excluded by `.gitignore` patterns or
 * configured ignore globs.
 */
export function isIgnored(relativePath: string, gitignore: string[], ignore: string[]): boolean {
  return (
    gitignore.some((pattern) => matchesGitignore(relativePath, pattern)) ||
    ignore.some((glob) => minimatch(relativePath, glob, { dot: true }))
  )
}

/**
 * Find the `.rs` files to analyze: `target` itself when it is a Rust file, otherwise every Rust
 * file below it, sorted by path.
 *
 * @throws IoError when `target` does not exist or a directory cannot be read
 */
export async function collectRustFiles(target: string, ignore: string[] = []): Promise<string[]> {
  let stats: fs.Stats
  try {
    stats = await fs.promises.stat(target)
  } catch (error) {
    throw new IoError(errorMessage(error), { path: target, cause: error })
  }

  if (stats.isFile()) {
    return target.endsWith(".rs") ? [target] : []
  }

  const gitignore = readGitignore(target)
  const visited = new Set<string>()
  const files: string[] = []

  const walk = async (dir: string) => {
    const realDir = await fs.promises.realpath(dir)
    if (visited.has(realDir)) return
    visited.add(realDir)

    let entries: fs.Dirent[]
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true })
    } catch (error) {
      throw new IoError(errorMessage(error), { path: dir, cause: error })
    }

    // Name order decides which of several links to one directory gets walked
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name)
      const relativePath = path.relative(target, fullPath).split(path.sep).join("/")
      if (isIgnored(relativePath, gitignore, ignore)) continue

      let isDirectory = entry.isDirectory()
      let isFile = entry.isFile()
      if (entry.isSymbolicLink()) {
        // Dangling links are skipped
        const linked = await fs.promises
          .stat(fullPath)
          .catch((error: NodeJS.ErrnoException) => {
            if (error.code === "ENOENT") return null
            throw error
          })
        isDirectory = linked?.isDirectory() ?? false
        isFile = linked?.isFile() ?? false
      }

      if (isDirectory && !SKIPPED_DIRECTORIES.has(entry.name)) {
        await walk(fullPath)
      } else if (isFile && entry.name.endsWith(".rs")) {
        files.push(fullPath)
      }
    }
  }

  await walk(target)
  return files.sort()
}
