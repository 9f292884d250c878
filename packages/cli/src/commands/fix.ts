import { unparse } from "@ferrule/core/syntaxTree"
import chalk from "chalk"

import { collectRustFiles } from "@ferrule/cli/files"
import { findModRsIssues, fixAllModRs } from "@ferrule/cli/modRs"
import { forEachFile, readSource, resolveChecks, writeSource } from "@ferrule/cli/pipeline"
import type { CommandContext, FileHooks, FixOptions } from "@ferrule/cli/types"

export interface FixSummary {
  /** Fixes applied (or, in a dry run, that would be applied) by the syntax analyzers */
  fixes: number
  /** Files rewritten */
  files: number
  /** `mod.rs` files moved */
  modRs: number
}

async function fixModRsLayout(options: FixOptions, hooks?: FileHooks): Promise<number> {
  const issues = await findModRsIssues(options.path, options.ignore)

  if (options.dryRun) {
    for (const issue of issues) {
      console.log(`Would fix: ${issue.path} -> ${issue.suggested}`)
    }
    return issues.length
  }

  const moved = await fixAllModRs(issues, hooks)
  if (moved > 0) {
    console.log(chalk.green(`Fixed ${moved} mod.rs files`))
  }
  return moved
}

/**
 * Apply every selected analyzer's fixes to each file's tree and write the result back.
 * Nothing is written in a dry run.
 */
export async function runFix(
  options: FixOptions,
  { logger, hooks }: CommandContext
): Promise<FixSummary> {
  const checks = resolveChecks(options.analyzers)
  const summary: FixSummary = { fixes: 0, files: 0, modRs: 0 }

  if (checks.modRs) {
    summary.modRs = await fixModRsLayout(options, hooks)
  }

  if (checks.analyzers.length === 0) return summary

  const files = await collectRustFiles(options.path, options.ignore)

  await forEachFile(files, hooks, async (filePath) => {
    const { tree } = await readSource(filePath)

    let fixed = 0
    for (const analyzer of checks.analyzers) {
      const count = analyzer.fix(tree)
      logger.debug({ file: filePath, analyzer: analyzer.name, fixed: count }, "Applied fixes")
      fixed += count
    }

    if (fixed === 0) return
    summary.fixes += fixed

    if (options.dryRun) {
      console.log(chalk.yellow(`Would fix ${fixed} issues in ${filePath}`))
      return
    }

    await writeSource(filePath, unparse(tree))
    summary.files++
    console.log(chalk.green(`Fixed ${fixed} issues in ${filePath}`))
  })

  return summary
}

/**
 * `fix` with every analyzer enabled.
 */
export function runFormat(
  options: Omit<FixOptions, "analyzers">,
  context: CommandContext
): Promise<FixSummary> {
  return runFix({ ...options, analyzers: undefined }, context)
}
