import type { Analyzer } from "@ferrule/core/analyzer"
import { getAnalyzers, MOD_RS_CHECK, selectAnalyzers } from "@ferrule/core/analyzers/index"
import { errorMessage, type FerruleError, IoError, ParseError } from "@ferrule/core/errors"
import { parse, type SyntaxTree } from "@ferrule/core/syntaxTree"
import chalk from "chalk"
import fs from "fs-extra"

import type { FileHooks } from "@ferrule/cli/types"

export interface Checks {
  analyzers: Analyzer[]
  /** Whether the `mod.rs` layout check runs */
  modRs: boolean
}

/**
 * Resolve check names from flags or config. Without names every check runs.
 *
 * @throws ConfigError when a name matches no check
 */
export function resolveChecks(names?: string[]): Checks {
  if (names === undefined) {
    return { analyzers: getAnalyzers(), modRs: true }
  }

  const unique = [...new Set(names)]
  return {
    analyzers: unique.flatMap((name) => selectAnalyzers(name)),
    modRs: unique.includes(MOD_RS_CHECK),
  }
}

export interface ParsedSource {
  source: string
  tree: SyntaxTree
}

export async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (error) {
    throw new IoError(errorMessage(error), { path: filePath, cause: error })
  }
}

/**
 * @throws IoError when the file cannot be read
 * @throws ParseError carrying the file path when the source does not parse
 */
export async function readSource(filePath: string): Promise<ParsedSource> {
  const source = await readText(filePath)

  try {
    return { source, tree: parse(source) }
  } catch (error) {
    throw error instanceof ParseError ? error.withPath(filePath) : error
  }
}

export async function writeSource(filePath: string, contents: string): Promise<void> {
  try {
    await fs.writeFile(filePath, contents, "utf-8")
  } catch (error) {
    throw new IoError(errorMessage(error), { path: filePath, cause: error })
  }
}

export function printFileError(filePath: string, error: FerruleError): void {
  console.error(chalk.red(`Error processing ${filePath}:`), error.message)
}

/**
 * Process files one at a time. Read and parse failures are handed to `onFileError` and the
 * batch moves on; any other error ends it.
 */
export async function forEachFile(
  files: string[],
  hooks: FileHooks | undefined,
  processFile: (filePath: string) => Promise<void>
): Promise<void> {
  const onFileError = hooks?.onFileError ?? printFileError

  for (const filePath of files) {
    try {
      await processFile(filePath)
    } catch (error) {
      if (error instanceof ParseError || error instanceof IoError) {
        onFileError(filePath, error)
        continue
      }
      throw error
    }
    hooks?.onFileDone?.(filePath)
  }
}
