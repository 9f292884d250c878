import { availableAnalyzerNames } from "@ferrule/core/analyzers/index"
import { ConfigError, FerruleError } from "@ferrule/core/errors"
import { createLogger } from "@ferrule/core/logger"
import chalk from "chalk"
import dotenv from "dotenv"
import meow from "meow"

import { runCheck } from "@ferrule/cli/commands/check"
import { runDiff } from "@ferrule/cli/commands/diff"
import { runFix, runFormat } from "@ferrule/cli/commands/fix"
import { runFmt } from "@ferrule/cli/commands/fmt"
import { runModRs } from "@ferrule/cli/commands/modRs"
import { loadConfig, resolveSettings } from "@ferrule/cli/config"
import { switchContext } from "@ferrule/cli/context"
import { printFileError } from "@ferrule/cli/pipeline"
import type { CommandContext } from "@ferrule/cli/types"
import { getLocalVersion } from "@ferrule/cli/version"

if (process.env.NODE_ENV !== "production") dotenv.config()

const cli = meow(
  `
Find and fix style issues in Rust sources

Usage:
  $ ferrule <command> [path] [options]

Commands:
  check [path]                       Report issues (default path: current directory)
  fix [path]                         Apply fixes in place
  format [path]                      Apply the fixes of every analyzer
  diff [path]                        Preview fixes before applying them
  mod-rs [path]                      Find x/mod.rs files that could be x.rs
  fmt                                Run cargo +nightly fmt with the project's rustfmt settings

Options for check:
  -v, --verbose                      Also show files without issues
  -a, --analyzer <name>              Run a single analyzer (${availableAnalyzerNames().join(", ")})
  --width <columns>                  Layout width (default: terminal width)
  --no-color                         Disable colors (env: NO_COLOR)

Options for fix:
  -d, --dry-run                      Show what would be fixed without writing files
  -a, --analyzer <name>              Run a single analyzer

Options for diff:
  -s, --summary                      Show per-file counts only
  -i, --interactive                  Choose which changes to apply
  -a, --analyzer <name>              Run a single analyzer
  --width <columns>                  Layout width (default: terminal width)
  --no-color                         Disable colors (env: NO_COLOR)

Options for mod-rs:
  --fix                              Move x/mod.rs to x.rs

Global options:
  -c, --context <directory>          Set working directory context (default: current directory)
  --debug                            Enable debug logging (env: FERRULE_DEBUG)
  --version                          Show version number
  -h, --help                         Show help

Settings are read from .ferrule.json in the working directory; flags take precedence.
`,
  {
    importMeta: import.meta,
    flags: {
      verbose: {
        type: "boolean",
        shortFlag: "v",
        default: false,
      },
      analyzer: {
        type: "string",
        shortFlag: "a",
      },
      dryRun: {
        type: "boolean",
        shortFlag: "d",
        default: false,
      },
      summary: {
        type: "boolean",
        shortFlag: "s",
        default: false,
      },
      interactive: {
        type: "boolean",
        shortFlag: "i",
        default: false,
      },
      fix: {
        type: "boolean",
        default: false,
      },
      color: {
        type: "boolean",
        default: true,
      },
      width: {
        type: "number",
      },
      context: {
        type: "string",
        shortFlag: "c",
      },
      debug: {
        type: "boolean",
        default: false,
      },
      help: {
        type: "boolean",
        shortFlag: "h",
      },
    },
    version: getLocalVersion(),
  }
)

function printConfigError(error: ConfigError) {
  console.error(chalk.red("Error:"), error.message)
  if (error.validNames.length > 0) {
    console.error("Available analyzers:")
    for (const name of error.validNames) {
      console.error(`  - ${name}`)
    }
  }
}

/**
 * Main function to orchestrate the workflow
 */
async function main() {
  try {
    if (cli.flags.context) switchContext(cli.flags.context)

    const settings = resolveSettings(
      {
        color: cli.flags.color,
        width: cli.flags.width,
        analyzer: cli.flags.analyzer,
        debug: cli.flags.debug,
      },
      loadConfig()
    )
    if (!settings.color) chalk.level = 0

    const logger = createLogger({ debug: settings.debug })
    const context: CommandContext = {
      logger,
      hooks: {
        onFileError: printFileError,
        onFileDone: (filePath) => logger.debug({ file: filePath }, "Processed file"),
      },
    }

    const command = cli.input[0]
    const path = cli.input[1] ?? "."
    const { analyzers, ignore, color, width } = settings

    switch (command) {
      case "check": {
        await runCheck(
          { path, verbose: cli.flags.verbose, analyzers, ignore, color, width },
          context
        )
        break
      }

      case "fix": {
        await runFix({ path, dryRun: cli.flags.dryRun, analyzers, ignore }, context)
        break
      }

      case "format": {
        await runFormat({ path, dryRun: cli.flags.dryRun, ignore }, context)
        break
      }

      case "diff": {
        await runDiff(
          {
            path,
            summary: cli.flags.summary,
            interactive: cli.flags.interactive,
            analyzers,
            ignore,
            color,
            width,
          },
          context
        )
        break
      }

      case "mod-rs": {
        await runModRs({ path, fix: cli.flags.fix, ignore }, context.hooks)
        break
      }

      case "fmt": {
        await runFmt()
        break
      }

      default:
        cli.showHelp(1)
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      printConfigError(error)
    } else if (error instanceof FerruleError) {
      console.error(chalk.red("Error:"), error.message)
    } else {
      console.error(chalk.red("Error:"), error)
    }
    process.exit(1)
  }
}

// Execute the main function
void main()
