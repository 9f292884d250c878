import { applyEntries } from "@ferrule/core/applyEntries"
import { DiffResult } from "@ferrule/core/diff"
import { generateDiff } from "@ferrule/core/diffGenerator"
import { type Ask, selectEntries, showFull, showSummary } from "@ferrule/core/display"
import chalk from "chalk"

import { collectRustFiles } from "@ferrule/cli/files"
import { forEachFile, readText, resolveChecks, writeSource } from "@ferrule/cli/pipeline"
import type { CommandContext, DiffOptions } from "@ferrule/cli/types"
import { askFixDecision } from "@ferrule/cli/ui/fixPrompt"

/**
 * Preview what `fix` would change in every file below `options.path`.
 */
export async function buildDiff(
  options: DiffOptions,
  { logger, hooks }: CommandContext
): Promise<DiffResult> {
  const checks = resolveChecks(options.analyzers)
  const result = new DiffResult()
  if (checks.analyzers.length === 0) return result

  const files = await collectRustFiles(options.path, options.ignore)
  await forEachFile(files, hooks, async (filePath) => {
    result.addFile(await generateDiff(filePath, checks.analyzers, logger))
  })

  logger.debug(
    { files: result.totalFiles(), changes: result.totalChanges() },
    "Generated diff"
  )
  return result
}

/**
 * Write accepted entries back to their files.
 *
 * @returns Number of files written
 */
export async function applySelection(selected: DiffResult): Promise<number> {
  for (const file of selected.files) {
    const source = await readText(file.path)
    await writeSource(file.path, applyEntries(source, file.entries))
    console.log(chalk.green(`Applied ${file.totalChanges()} changes to ${file.path}`))
  }
  return selected.totalFiles()
}

export async function runDiff(
  options: DiffOptions,
  context: CommandContext,
  ask: Ask = askFixDecision
): Promise<void> {
  const result = await buildDiff(options, context)

  if (result.totalChanges() === 0) {
    console.log(chalk.green("No changes proposed"))
    return
  }

  if (options.summary) {
    showSummary(result, { color: options.color })
  } else if (options.interactive) {
    const selected = await selectEntries(result, ask, { color: options.color })
    await applySelection(selected)
  } else {
    showFull(result, { color: options.color, width: options.width })
  }
}
