import { Chalk } from "chalk"

import type { FileDiff } from "@ferrule/core/diff"
import { toBlock } from "@ferrule/core/grid"
import { groupImports } from "@ferrule/core/importGrouping"
import type { RenderedBlock } from "@ferrule/core/types"

const SEPARATOR = "─".repeat(40)
const FOOTER = "═".repeat(40)

/**
 * Render one file's previewed changes as a block for the grid layout: a header, the grouped
 * imports the changes need, then each analyzer's entries as `-`/`+` line pairs.
 */
export function renderFileBlock(fileDiff: FileDiff, color: boolean): RenderedBlock {
  const chalk = new Chalk({ level: color ? 1 : 0 })
  const lines: string[] = [chalk.cyan.bold(`File: ${fileDiff.path}`), chalk.dim(SEPARATOR)]

  const imports = fileDiff.entries.flatMap((entry) => (entry.import ? [entry.import] : []))
  if (imports.length > 0) {
    lines.push(chalk.dim("Imports (file top)"))
    for (const statement of groupImports(imports)) {
      lines.push(chalk.green(`+    ${statement}`))
    }
    lines.push("")
  }

  let lastAnalyzer = ""
  for (const entry of fileDiff.entries) {
    if (entry.analyzer !== lastAnalyzer) {
      if (lastAnalyzer) lines.push("")

      const count = fileDiff.entries.filter((e) => e.analyzer === entry.analyzer).length
      lines.push(chalk.green.bold(`${entry.analyzer} (${count} issues)`), "")
      lastAnalyzer = entry.analyzer
    }

    lines.push(
      chalk.cyan(`Line ${entry.line}`),
      chalk.red(`-    ${entry.original}`),
      chalk.green(`+    ${entry.modified}`),
      ""
    )
  }

  lines.push(chalk.dim(FOOTER))
  return toBlock(lines)
}
