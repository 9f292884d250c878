/**
 * Base class for every error ferrule reports to the user.
 */
export class FerruleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * A file could not be read or written, or an external tool failed.
 */
export class IoError extends FerruleError {
  readonly path?: string

  constructor(message: string, { path, cause }: { path?: string; cause?: unknown } = {}) {
    super(path ? `IO error: ${path}: ${message}` : `IO error: ${message}`, { cause })
    this.path = path
  }
}

/**
 * Source text could not be parsed into a syntax tree.
 */
export class ParseError extends FerruleError {
  readonly reason: string
  readonly line: number
  readonly column: number
  readonly path?: string

  constructor(
    message: string,
    { line, column, path }: { line: number; column: number; path?: string }
  ) {
    super(`Parse error${path ? ` in ${path}` : ""} at ${line}:${column}: ${message}`)
    this.reason = message
    this.line = line
    this.column = column
    this.path = path
  }

  /**
   * Returns the same error annotated with the file it came from
   */
  withPath(path: string): ParseError {
    return new ParseError(this.reason, { line: this.line, column: this.column, path })
  }
}

/**
 * Invalid user input: unknown analyzer, malformed config file, bad flag value.
 */
export class ConfigError extends FerruleError {
  readonly validNames: string[]

  constructor(message: string, validNames: string[] = []) {
    super(message)
    this.validNames = validNames
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
