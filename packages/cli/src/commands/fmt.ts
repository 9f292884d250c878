import chalk from "chalk"

import { formatCode } from "@ferrule/cli/formatter"

export async function runFmt(cwd: string = process.cwd()): Promise<void> {
  console.log(chalk.dim("Running cargo +nightly fmt..."))
  await formatCode(cwd)
  console.log(chalk.green("Code formatted successfully"))
}
