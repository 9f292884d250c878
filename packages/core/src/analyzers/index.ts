import type { Analyzer } from "@ferrule/core/analyzer"
import { EmptyLinesAnalyzer } from "@ferrule/core/analyzers/EmptyLinesAnalyzer"
import { FormatArgsAnalyzer } from "@ferrule/core/analyzers/FormatArgsAnalyzer"
import { InlineCommentsAnalyzer } from "@ferrule/core/analyzers/InlineCommentsAnalyzer"
import { PathImportAnalyzer } from "@ferrule/core/analyzers/PathImportAnalyzer"
import { ConfigError } from "@ferrule/core/errors"

/** Name of the file layout check, which works on paths rather than syntax trees */
export const MOD_RS_CHECK = "mod_rs"

/**
 * Fresh instances of every analyzer, in the order their results are reported.
 */
export function getAnalyzers(): Analyzer[] {
  return [
    new PathImportAnalyzer(),
    new FormatArgsAnalyzer(),
    new EmptyLinesAnalyzer(),
    new InlineCommentsAnalyzer(),
  ]
}

export function availableAnalyzerNames(): string[] {
  return [...getAnalyzers().map((analyzer) => analyzer.name), MOD_RS_CHECK]
}

/**
 * Analyzers to run for an optional `--analyzer` filter. Selecting the `mod_rs` check gives no
 * syntax analyzers.
 *
 * @throws ConfigError when the name matches nothing
 */
export function selectAnalyzers(name?: string): Analyzer[] {
  const analyzers = getAnalyzers()
  if (name === undefined) return analyzers
  if (name === MOD_RS_CHECK) return []

  const selected = analyzers.filter((analyzer) => analyzer.name === name)
  if (selected.length === 0) {
    throw new ConfigError(`Unknown analyzer: ${name}`, availableAnalyzerNames())
  }
  return selected
}

export {
  EmptyLinesAnalyzer,
  FormatArgsAnalyzer,
  InlineCommentsAnalyzer,
  PathImportAnalyzer,
}
