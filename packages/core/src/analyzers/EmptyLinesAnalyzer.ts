import type { Analyzer } from "@ferrule/core/analyzer"
import { findFunctionBodies, sourceLines } from "@ferrule/core/analyzers/functionBodies"
import type { SyntaxTree } from "@ferrule/core/syntaxTree"
import {
  type AnalysisResult,
  createAnalysisResult,
  type Issue,
  simpleFix,
} from "@ferrule/core/types"

/**
 * Flags blank lines inside function bodies. A function that needs blank lines to separate its
 * steps usually wants splitting up.
 *
 * Blank lines directly after an opening brace or directly before a closing brace are allowed.
 */
export class EmptyLinesAnalyzer implements Analyzer {
  readonly name = "empty_lines"

  analyze(tree: SyntaxTree, source: string): AnalysisResult {
    const lines = sourceLines(source)
    const reported = new Set<number>()
    const issues: Issue[] = []

    for (const { startLine, endLine } of findFunctionBodies(tree)) {
      for (let lineNumber = startLine + 1; lineNumber < endLine - 1; lineNumber++) {
        const idx = lineNumber - 1
        if (reported.has(lineNumber) || lines[idx]?.trim() !== "") continue
        if (isAfterOpeningBrace(lines, idx) || isBeforeClosingBrace(lines, idx)) continue

        reported.add(lineNumber)
        issues.push({
          line: lineNumber,
          column: 1,
          message: "Empty line in function body indicates untamed complexity",
          fix: simpleFix(""),
        })
      }
    }

    issues.sort((a, b) => a.line - b.line)
    return createAnalysisResult(issues)
  }

  fix(): number {
    return 0
  }
}

function isAfterOpeningBrace(lines: string[], idx: number): boolean {
  return idx > 0 && (lines[idx - 1] ?? "").trim().endsWith("{")
}

function isBeforeClosingBrace(lines: string[], idx: number): boolean {
  return (lines[idx + 1] ?? "").trim().startsWith("}")
}
