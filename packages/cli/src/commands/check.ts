import { GlobalReport, Report } from "@ferrule/core/report"

import { collectRustFiles } from "@ferrule/cli/files"
import { findModRsIssues, modRsReport } from "@ferrule/cli/modRs"
import { forEachFile, readSource, resolveChecks } from "@ferrule/cli/pipeline"
import type { CheckOptions, CommandContext } from "@ferrule/cli/types"

/**
 * Run the selected checks over every file below `options.path`. Files without issues are only
 * included with `verbose`.
 */
export async function checkQuality(
  options: CheckOptions,
  { logger, hooks }: CommandContext
): Promise<GlobalReport> {
  const checks = resolveChecks(options.analyzers)
  const globalReport = new GlobalReport()

  if (checks.modRs) {
    for (const issue of await findModRsIssues(options.path, options.ignore)) {
      globalReport.addReport(modRsReport(issue))
    }
  }

  if (checks.analyzers.length === 0) return globalReport

  const files = await collectRustFiles(options.path, options.ignore)
  logger.debug({ path: options.path, files: files.length }, "Checking files")

  await forEachFile(files, hooks, async (filePath) => {
    const { source, tree } = await readSource(filePath)
    const report = new Report(filePath)

    for (const analyzer of checks.analyzers) {
      report.addResult(analyzer.name, analyzer.analyze(tree, source))
    }

    if (options.verbose || report.totalIssues() > 0) {
      globalReport.addReport(report)
    }
  })

  return globalReport
}

export async function runCheck(options: CheckOptions, context: CommandContext): Promise<void> {
  const globalReport = await checkQuality(options, context)
  const { width, color, verbose } = options
  for (const line of globalReport.render({ width, color, verbose })) {
    console.log(line)
  }
}
