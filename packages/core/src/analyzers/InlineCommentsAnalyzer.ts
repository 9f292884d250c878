import type { Analyzer } from "@ferrule/core/analyzer"
import { findFunctionBodies, sourceLines } from "@ferrule/core/analyzers/functionBodies"
import type { SyntaxTree } from "@ferrule/core/syntaxTree"
import { type AnalysisResult, createAnalysisResult, type Issue, NO_FIX } from "@ferrule/core/types"

/**
 * Flags `//` comments inside function bodies. Explanations belong in the function's doc comment,
 * under a `# Notes` section, so the message proposes the doc line to write.
 */
export class InlineCommentsAnalyzer implements Analyzer {
  readonly name = "inline_comments"

  analyze(tree: SyntaxTree, source: string): AnalysisResult {
    const lines = sourceLines(source)
    const reported = new Set<number>()
    const issues: Issue[] = []

    for (const { startLine, endLine } of findFunctionBodies(tree)) {
      for (let lineNumber = startLine; lineNumber < endLine; lineNumber++) {
        const idx = lineNumber - 1
        const trimmed = (lines[idx] ?? "").trim()
        if (reported.has(lineNumber) || !isInlineComment(trimmed)) continue

        reported.add(lineNumber)
        issues.push({
          line: lineNumber,
          column: 1,
          message: commentMessage(commentText(trimmed), findRelatedCodeLine(lines, idx)),
          fix: NO_FIX,
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

function isInlineComment(trimmed: string): boolean {
  return trimmed.startsWith("//") && !trimmed.startsWith("///")
}

function commentText(trimmed: string): string {
  return trimmed.replace(/^(\/\/)+/, "").trim()
}

/**
 * The first line after the comment that holds code, skipping blank lines, other comments and
 * closing braces.
 */
function findRelatedCodeLine(lines: string[], commentIdx: number): string | undefined {
  for (const line of lines.slice(commentIdx + 1)) {
    const trimmed = line.trim()
    if (trimmed === "" || trimmed.startsWith("//") || trimmed.startsWith("}")) continue
    return trimmed
  }
  return undefined
}

function commentMessage(comment: string, code: string | undefined): string {
  const note = code === undefined ? `/// - ${comment}` : `/// - ${comment} - \`${code}\``
  return `Inline comment found: "${comment}"\nMove to doc block # Notes section:\n${note}`
}
