import chalk from "chalk"

import { findModRsIssues, fixAllModRs } from "@ferrule/cli/modRs"
import type { FileHooks, ModRsOptions } from "@ferrule/cli/types"

/**
 * List `mod.rs` files that could be `<module>.rs`, or move them with `fix`.
 *
 * @returns Number of `mod.rs` files found, or moved with `fix`
 */
export async function runModRs(options: ModRsOptions, hooks?: FileHooks): Promise<number> {
  const issues = await findModRsIssues(options.path, options.ignore)

  if (issues.length === 0) {
    console.log(chalk.green("No mod.rs files found"))
    return 0
  }

  if (options.fix) {
    const moved = await fixAllModRs(issues, hooks)
    console.log(chalk.green(`Fixed ${moved} mod.rs files`))
    return moved
  }

  console.log(chalk.yellow(`Found ${issues.length} mod.rs files:`))
  for (const issue of issues) {
    console.log(`  ${issue.path} -> ${issue.suggested}`)
  }
  console.log("")
  console.log(chalk.dim("Run with --fix to apply changes"))
  return issues.length
}
