import type { SyntaxTree } from "@ferrule/core/syntaxTree"
import type { AnalysisResult } from "@ferrule/core/types"

/**
 * A detector for one category of style issue.
 *
 * Implementations must keep `analyze` free of side effects: the differ calls it on the same tree
 * for every analyzer in turn and relies on each one seeing the original source.
 */
export interface Analyzer {
  /** Unique, lowercase snake_case identifier used for filtering and report grouping */
  readonly name: string

  /**
   * Find issues in a parsed file. `source` is the text the tree was parsed from.
   */
  analyze(tree: SyntaxTree, source: string): AnalysisResult

  /**
   * Apply the analyzer's fixes to the tree in place.
   *
   * @returns Number of fixes applied
   */
  fix(tree: SyntaxTree): number
}
