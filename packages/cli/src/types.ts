import type { FerruleError } from "@ferrule/core/errors"
import type { Logger } from "@ferrule/core/logger"

interface BaseOptions {
  /** File or directory to process */
  path: string
  /** Names of the checks to run; undefined runs every check */
  analyzers?: string[]
  /** Globs of paths to skip, relative to `path` */
  ignore: string[]
}

interface OutputOptions {
  color: boolean
  /** Terminal width used for the grid layout */
  width: number
}

export interface CheckOptions extends BaseOptions, OutputOptions {
  verbose: boolean
}

export interface FixOptions extends BaseOptions {
  dryRun: boolean
}

export interface DiffOptions extends BaseOptions, OutputOptions {
  summary: boolean
  interactive: boolean
}

export interface ModRsOptions {
  path: string
  fix: boolean
  ignore: string[]
}

export interface FileHooks {
  /** A file could not be read or parsed; the run continues with the next file */
  onFileError?: (filePath: string, error: FerruleError) => void
  onFileDone?: (filePath: string) => void
}

export interface CommandContext {
  logger: Logger
  hooks?: FileHooks
}
