/**
 * Describes how an issue can be fixed. Fixes are declarative: analyzers only describe the change,
 * the differ and the fix pipeline decide how to apply it.
 */
export type Fix =
  | { kind: "none" }
  | {
      kind: "simple"
      /** Replaces the issue's source line wholesale */
      replacement: string
    }
  | {
      kind: "withImport"
      /** Import to add at the top of the file, e.g. `use std::fs::read;` */
      importStatement: string
      /** Text searched on the issue's line (first occurrence only) */
      searchPattern: string
      replacement: string
    }

/**
 * Represents a single quality issue found by an analyzer.
 */
export interface Issue {
  /** 1-based line number, 0 when the issue has no location */
  line: number
  /** 1-based column number */
  column: number
  message: string
  fix: Fix
}

/**
 * Represents the outcome of running one analyzer over one file.
 */
export interface AnalysisResult {
  issues: Issue[]
  /** Number of issues with an available fix */
  fixableCount: number
}

/**
 * Represents one previewed change: an issue's fix rendered as before/after text.
 */
export interface DiffEntry {
  line: number
  analyzer: string
  original: string
  modified: string
  description: string
  /** Import that has to be added for the change to compile */
  import?: string
  /** In-line edit behind `modified`, so it can be replayed on a line another entry changed */
  edit?: { searchPattern: string; replacement: string }
}

/**
 * A pre-rendered presentation unit for the grid layout.
 */
export interface RenderedBlock {
  /** Output lines, possibly with embedded ANSI color codes */
  lines: string[]
  /** Maximum visible width of the lines, floored at the minimum block width */
  width: number
}

export const NO_FIX: Fix = { kind: "none" }

export function isFixAvailable(fix: Fix): boolean {
  return fix.kind !== "none"
}

export function simpleFix(replacement: string): Fix {
  return { kind: "simple", replacement }
}

export function importFix(
  importStatement: string,
  searchPattern: string,
  replacement: string
): Fix {
  return { kind: "withImport", importStatement, searchPattern, replacement }
}

export function createAnalysisResult(issues: Issue[]): AnalysisResult {
  return {
    issues,
    fixableCount: issues.filter((issue) => isFixAvailable(issue.fix)).length,
  }
}
