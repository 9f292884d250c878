import path from "path"

import { errorMessage, IoError } from "@ferrule/core/errors"
import { Report } from "@ferrule/core/report"
import { createAnalysisResult, simpleFix } from "@ferrule/core/types"
import fs from "fs-extra"

import { collectRustFiles } from "@ferrule/cli/files"
import { forEachFile } from "@ferrule/cli/pipeline"
import type { FileHooks } from "@ferrule/cli/types"

export interface ModRsIssue {
  /** The `mod.rs` file */
  path: string
  /** Where the module file belongs, named after its directory */
  suggested: string
  message: string
}

export function createModRsIssue(filePath: string): ModRsIssue | null {
  const parent = path.dirname(filePath)
  const moduleName = path.basename(parent)
  if (path.basename(filePath) !== "mod.rs" || !moduleName || parent === path.dirname(parent)) {
    return null
  }

  return {
    path: filePath,
    suggested: path.join(path.dirname(parent), `${moduleName}.rs`),
    message: `Use \`${moduleName}.rs\` instead of \`${moduleName}/mod.rs\` (modern module style)`,
  }
}

/**
 * Find `mod.rs` files that could use the `<module>.rs` layout instead.
 */
export async function findModRsIssues(
  target: string,
  ignore: string[] = []
): Promise<ModRsIssue[]> {
  const files = await collectRustFiles(target, ignore)
  return files.flatMap((file) => {
    const issue = createModRsIssue(file)
    return issue ? [issue] : []
  })
}

/**
 * Move a `mod.rs` file to its suggested path and remove its directory when nothing else is
 * left in it.
 *
 * @throws IoError when the suggested file already exists or the move fails
 */
export async function fixModRs(issue: ModRsIssue): Promise<void> {
  try {
    await fs.move(issue.path, issue.suggested, { overwrite: false })

    const dir = path.dirname(issue.path)
    if ((await fs.readdir(dir)).length === 0) {
      await fs.rmdir(dir)
    }
  } catch (error) {
    throw new IoError(errorMessage(error), { path: issue.path, cause: error })
  }
}

/**
 * Move each `mod.rs` file. A move that fails goes to `onFileError` and the rest still run.
 *
 * @returns Number of files moved
 */
export async function fixAllModRs(issues: ModRsIssue[], hooks?: FileHooks): Promise<number> {
  const byPath = new Map(issues.map((issue) => [issue.path, issue]))
  let moved = 0

  await forEachFile([...byPath.keys()], hooks, async (filePath) => {
    const issue = byPath.get(filePath)
    if (!issue) return
    await fixModRs(issue)
    moved++
  })

  return moved
}

/**
 * Report a `mod.rs` issue alongside the syntax analyzers' reports.
 */
export function modRsReport(issue: ModRsIssue): Report {
  const report = new Report(issue.path)
  report.addResult(
    "mod_rs",
    createAnalysisResult([
      { line: 1, column: 1, message: issue.message, fix: simpleFix(issue.suggested) },
    ])
  )
  return report
}
