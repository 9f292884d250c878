import { Chalk, type ChalkInstance } from "chalk"

import { calculateColumns, renderGrid, toBlock } from "@ferrule/core/grid"
import type { AnalysisResult, Fix, Issue, RenderedBlock } from "@ferrule/core/types"

/**
 * Analysis results for one file, in the order the analyzers ran.
 */
export class Report {
  readonly results: [analyzer: string, result: AnalysisResult][] = []

  constructor(readonly filePath: string) {}

  addResult(analyzer: string, result: AnalysisResult): void {
    this.results.push([analyzer, result])
  }

  totalIssues(): number {
    return this.results.reduce((sum, [, result]) => sum + result.issues.length, 0)
  }

  totalFixable(): number {
    return this.results.reduce((sum, [, result]) => sum + result.fixableCount, 0)
  }
}

function describeFix(fix: Fix): string[] {
  switch (fix.kind) {
    case "withImport":
      return [`Fix: Add import: ${fix.importStatement}`, "(Will replace path with short name)"]
    case "simple":
      return [`Fix: ${fix.replacement}`]
    case "none":
      return []
  }
}

/**
 * Plain-text report for one file. Analyzers without issues are left out.
 */
export function formatReport(report: Report): string {
  const lines = [`Quality report for: ${report.filePath}`, "="]

  for (const [analyzer, result] of report.results) {
    if (result.issues.length === 0) continue

    lines.push("", `[${analyzer}]`)
    for (const issue of result.issues) {
      lines.push(`  ${issue.line}:${issue.column} - ${issue.message}`)
      lines.push(...describeFix(issue.fix).map((text) => `    ${text}`))
    }
  }

  lines.push("", `Total issues: ${report.totalIssues()}`, `Fixable: ${report.totalFixable()}`)
  return lines.join("\n") + "\n"
}

function renderIssue(issue: Issue, chalk: ChalkInstance): string[] {
  const [first, ...rest] = issue.message.split("\n")
  return [
    `  ${chalk.cyan(`${issue.line}:${issue.column}`)} ${first}`,
    ...rest.map((line) => `      ${line}`),
    ...describeFix(issue.fix).map((text) => chalk.dim(`    ${text}`)),
  ]
}

/**
 * Render one file's report as a block for the grid layout.
 */
export function renderReportBlock(report: Report, color: boolean): RenderedBlock {
  const chalk = new Chalk({ level: color ? 1 : 0 })
  const lines = [chalk.cyan.bold(`File: ${report.filePath}`), chalk.dim("─".repeat(40))]

  for (const [analyzer, result] of report.results) {
    if (result.issues.length === 0) continue

    lines.push(chalk.green.bold(`${analyzer} (${result.issues.length} issues)`))
    for (const issue of result.issues) {
      lines.push(...renderIssue(issue, chalk))
    }
    lines.push("")
  }

  if (report.totalIssues() === 0) {
    lines.push(chalk.green("No issues"), "")
  }

  lines.push(
    chalk.dim(`Issues: ${report.totalIssues()}, fixable: ${report.totalFixable()}`),
    chalk.dim("═".repeat(40))
  )
  return toBlock(lines)
}

/**
 * Reports of every checked file, laid out together for the `check` command.
 */
export class GlobalReport {
  readonly reports: Report[] = []

  addReport(report: Report): void {
    this.reports.push(report)
  }

  totalIssues(): number {
    return this.reports.reduce((sum, report) => sum + report.totalIssues(), 0)
  }

  totalFixable(): number {
    return this.reports.reduce((sum, report) => sum + report.totalFixable(), 0)
  }

  /**
   * Report blocks laid out in a grid, then the totals. With `verbose` each file gets the
   * plain-text `formatReport` listing instead, one after another.
   */
  render({
    width,
    color,
    verbose = false,
  }: {
    width: number
    color: boolean
    verbose?: boolean
  }): string[] {
    const chalk = new Chalk({ level: color ? 1 : 0 })
    if (this.reports.length === 0) {
      return [chalk.green("No issues found")]
    }

    const blocks = this.reports.map((report) => renderReportBlock(report, color))
    const body = verbose
      ? this.reports.flatMap((report) => formatReport(report).split("\n"))
      : renderGrid(blocks, calculateColumns(blocks, width))
    return [
      ...body,
      chalk.yellow.bold(`Total issues: ${this.totalIssues()}`),
      chalk.yellow(`Fixable: ${this.totalFixable()}`),
    ]
  }
}
