// Analyzer contract and registry
export type { Analyzer } from "./analyzer"
export {
  getAnalyzers,
  selectAnalyzers,
  availableAnalyzerNames,
  MOD_RS_CHECK,
  PathImportAnalyzer,
  FormatArgsAnalyzer,
  EmptyLinesAnalyzer,
  InlineCommentsAnalyzer,
} from "./analyzers/index"

// Types
export type { Fix, Issue, AnalysisResult, DiffEntry, RenderedBlock } from "./types"
export {
  NO_FIX,
  isFixAvailable,
  simpleFix,
  importFix,
  createAnalysisResult,
} from "./types"

// Syntax tree
export type { SyntaxTree, Token, Group, TokenTree } from "./syntaxTree"
export {
  parse,
  unparse,
  walk,
  innerAttributesEnd,
  insertLeadingStatements,
} from "./syntaxTree"

// Diff pipeline
export { FileDiff, DiffResult } from "./diff"
export { generateDiff, generateDiffForSource } from "./diffGenerator"
export { applyEntries } from "./applyEntries"
export { groupImports, findCommonPrefix, importedPaths, importPath } from "./importGrouping"

// Presentation
export {
  visibleWidth,
  padToWidth,
  calculateColumns,
  renderGrid,
  toBlock,
  COLUMN_GAP,
  MIN_BLOCK_WIDTH,
} from "./grid"
export { renderFileBlock } from "./renderDiff"
export type { Ask, DisplayOptions, FullDisplayOptions } from "./display"
export { formatSummary, formatFull, showSummary, showFull, selectEntries } from "./display"
export { Report, GlobalReport, formatReport, renderReportBlock } from "./report"

// Errors and logging
export { FerruleError, IoError, ParseError, ConfigError, errorMessage } from "./errors"
export type { Logger } from "./logger"
export { createLogger } from "./logger"
