import fs from "fs/promises"

import type { Analyzer } from "@ferrule/core/analyzer"
import { sourceLines } from "@ferrule/core/analyzers/functionBodies"
import { FileDiff } from "@ferrule/core/diff"
import { errorMessage, IoError, ParseError } from "@ferrule/core/errors"
import type { Logger } from "@ferrule/core/logger"
import { parse, type SyntaxTree } from "@ferrule/core/syntaxTree"
import { type DiffEntry, isFixAvailable, type Issue } from "@ferrule/core/types"

/**
 * Preview the fixes every analyzer would make to a file, without touching the file.
 *
 * @throws IoError when the file cannot be read
 * @throws ParseError when the file is not valid source; no partial diff is returned
 */
export async function generateDiff(
  filePath: string,
  analyzers: Analyzer[],
  logger?: Logger
): Promise<FileDiff> {
  let source: string
  try {
    source = await fs.readFile(filePath, "utf-8")
  } catch (error) {
    throw new IoError(errorMessage(error), { path: filePath, cause: error })
  }

  return generateDiffForSource(filePath, source, analyzers, logger)
}

/**
 * Same as {@link generateDiff} for source text already in memory.
 */
export function generateDiffForSource(
  filePath: string,
  source: string,
  analyzers: Analyzer[],
  logger?: Logger
): FileDiff {
  let tree: SyntaxTree
  try {
    tree = parse(source)
  } catch (error) {
    throw error instanceof ParseError ? error.withPath(filePath) : error
  }

  const lines = sourceLines(source)
  const fileDiff = new FileDiff(filePath)

  for (const analyzer of analyzers) {
    const result = analyzer.analyze(tree, source)
    logger?.debug(
      { file: filePath, analyzer: analyzer.name, issues: result.issues.length },
      "Analyzed file"
    )

    for (const issue of result.issues) {
      const entry = toDiffEntry(issue, analyzer.name, lines)
      if (entry) fileDiff.addEntry(entry)
    }
  }

  return fileDiff
}

function toDiffEntry(issue: Issue, analyzer: string, lines: string[]): DiffEntry | null {
  if (issue.line === 0 || !isFixAvailable(issue.fix)) return null

  const original = lines[issue.line - 1] ?? ""
  const base = { line: issue.line, analyzer, original, description: issue.message }

  switch (issue.fix.kind) {
    case "simple":
      return { ...base, modified: issue.fix.replacement }
    case "withImport": {
      const { searchPattern, replacement, importStatement } = issue.fix
      return {
        ...base,
        modified: original.replace(searchPattern, () => replacement),
        import: importStatement,
        edit: { searchPattern, replacement },
      }
    }
    case "none":
      return null
  }
}
