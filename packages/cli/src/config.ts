import fs from "fs"
import path from "path"

import { ConfigError, errorMessage } from "@ferrule/core/errors"
import { z } from "zod"

// Configuration file looked up in the working directory
export const CONFIG_FILE = ".ferrule.json"

const configSchema = z
  .object({
    analyzers: z.array(z.string()).optional(),
    ignore: z.array(z.string()).default([]),
    width: z.number().int().positive().optional(),
    color: z.boolean().default(true),
  })
  .strict()

export type FerruleConfig = z.infer<typeof configSchema>

// Default configuration
const DEFAULT_CONFIG: FerruleConfig = {
  ignore: [],
  color: true,
}

/**
 * Load the config from `.ferrule.json` in `cwd`, or the defaults when there is none.
 *
 * @throws ConfigError when the file is not valid JSON or does not match the schema
 */
export function loadConfig(cwd: string = process.cwd()): FerruleConfig {
  const configPath = path.join(cwd, CONFIG_FILE)
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG }
  }

  let data: unknown
  try {
    data = JSON.parse(fs.readFileSync(configPath, "utf-8"))
  } catch (error) {
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${errorMessage(error)}`)
  }

  const parsed = configSchema.safeParse(data)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    )
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${problems.join("; ")}`)
  }

  return parsed.data
}

export interface Settings {
  color: boolean
  width: number
  /** Names of the checks to run; undefined runs every check */
  analyzers?: string[]
  ignore: string[]
  debug: boolean
}

/**
 * Combine flags, the config file and the environment. Flags win over the file.
 */
export function resolveSettings(
  flags: { color: boolean; width?: number; analyzer?: string; debug: boolean },
  config: FerruleConfig,
  env: NodeJS.ProcessEnv = process.env,
  terminalWidth: number | undefined = process.stdout.columns
): Settings {
  return {
    color: flags.color && config.color && env.NO_COLOR === undefined,
    width: flags.width ?? config.width ?? terminalWidth ?? 80,
    analyzers: flags.analyzer ? [flags.analyzer] : config.analyzers,
    ignore: config.ignore,
    debug: flags.debug || env.FERRULE_DEBUG === "1" || env.FERRULE_DEBUG === "true",
  }
}
