import { Chalk, type ChalkInstance } from "chalk"

import { DiffResult, FileDiff } from "@ferrule/core/diff"
import { calculateColumns, renderGrid } from "@ferrule/core/grid"
import { renderFileBlock } from "@ferrule/core/renderDiff"
import type { DiffEntry } from "@ferrule/core/types"

export interface DisplayOptions {
  color: boolean
}

export interface FullDisplayOptions extends DisplayOptions {
  /** Terminal width in columns */
  width: number
}

/** Reads the user's answer to a prompt */
export type Ask = (prompt: string) => Promise<string>

type Print = (line: string) => void

const consolePrint: Print = (line) => console.log(line)

function colors(color: boolean): ChalkInstance {
  return new Chalk({ level: color ? 1 : 0 })
}

function totalLine(result: DiffResult, chalk: ChalkInstance): string {
  return chalk.yellow.bold(
    `Total: ${result.totalChanges()} changes in ${result.totalFiles()} files`
  )
}

/**
 * Per-file issue counts by analyzer, in the order analyzers first appear.
 */
export function formatSummary(result: DiffResult, { color }: DisplayOptions): string[] {
  const chalk = colors(color)
  const lines = ["", chalk.bold("DIFF SUMMARY"), ""]

  for (const file of result.files) {
    lines.push(`${chalk.cyan.bold(file.path)}:`)

    const counts = new Map<string, number>()
    for (const entry of file.entries) {
      counts.set(entry.analyzer, (counts.get(entry.analyzer) ?? 0) + 1)
    }

    for (const [analyzer, count] of counts) {
      lines.push(`  ${chalk.green(analyzer)}: ${count} ${count === 1 ? "issue" : "issues"}`)
    }
    lines.push("")
  }

  lines.push(totalLine(result, chalk))
  return lines
}

/**
 * Every file's changes as blocks in a grid sized to the terminal.
 */
export function formatFull(result: DiffResult, { color, width }: FullDisplayOptions): string[] {
  const chalk = colors(color)
  const lines = ["", chalk.bold("DIFF OUTPUT"), ""]

  const blocks = result.files.map((file) => renderFileBlock(file, color))
  const columns = calculateColumns(blocks, width)

  if (columns > 1) {
    lines.push(chalk.dim(`Layout: ${columns} columns (terminal width: ${width})`), "")
  }

  lines.push(...renderGrid(blocks, columns), totalLine(result, chalk))
  return lines
}

export function showSummary(result: DiffResult, options: DisplayOptions): void {
  formatSummary(result, options).forEach(consolePrint)
}

export function showFull(result: DiffResult, options: FullDisplayOptions): void {
  formatFull(result, options).forEach(consolePrint)
}

function printEntry(
  entry: DiffEntry,
  position: string,
  chalk: ChalkInstance,
  print: Print
): void {
  print(`${chalk.yellow(position)} ${chalk.green(entry.analyzer)}`)
  print(chalk.dim(`Line ${entry.line}:`))
  print(chalk.red(`- ${entry.original}`))
  if (entry.import) {
    print(chalk.green(`+ ${entry.import}`))
  }
  print(chalk.green(`+ ${entry.modified}`))
  print("")
}

/**
 * Walk through every entry and ask whether to apply it.
 *
 * Answers: `y`/`yes` accepts, `n`/`no` skips, `a`/`all` accepts this entry and every remaining
 * one without asking, `q`/`quit` stops. Anything else skips the entry.
 *
 * @returns The accepted entries, grouped by file in their original order
 */
export async function selectEntries(
  result: DiffResult,
  ask: Ask,
  { color }: DisplayOptions,
  print: Print = consolePrint
): Promise<DiffResult> {
  const chalk = colors(color)
  const selected = new DiffResult()
  let applyAll = false
  let quit = false

  print("")
  print(chalk.bold("INTERACTIVE DIFF"))
  print("")
  print(chalk.dim("Commands: y=yes, n=no, a=all, q=quit"))
  print("")

  for (const file of result.files) {
    if (quit) break

    const accepted = new FileDiff(file.path)
    print(chalk.cyan.bold(`File: ${file.path}`))
    print("")

    for (const [idx, entry] of file.entries.entries()) {
      printEntry(entry, `[${idx + 1}/${file.entries.length}]`, chalk, print)

      if (applyAll) {
        accepted.addEntry(entry)
        continue
      }

      const answer = (await ask(chalk.bold("Apply this fix? [y/n/a/q]: "))).trim().toLowerCase()
      switch (answer) {
        case "y":
        case "yes":
          accepted.addEntry(entry)
          print(chalk.green("Applied"))
          break
        case "n":
        case "no":
          print(chalk.yellow("Skipped"))
          break
        case "a":
        case "all":
          applyAll = true
          accepted.addEntry(entry)
          print(chalk.green.bold("Applying all remaining changes"))
          break
        case "q":
        case "quit":
          print(chalk.red("Quit"))
          quit = true
          break
        default:
          print(chalk.red("Invalid input, skipping"))
      }
      print("")

      if (quit) break
    }

    selected.addFile(accepted)
  }

  print("")
  print(chalk.yellow.bold(`Selected ${selected.totalChanges()} changes for application`))

  return selected
}
