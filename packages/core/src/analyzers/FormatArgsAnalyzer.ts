import type { Analyzer } from "@ferrule/core/analyzer"
import {
  firstToken,
  type Group,
  isGroup,
  isIdent,
  isPunct,
  type SyntaxTree,
  type TokenTree,
  walk,
} from "@ferrule/core/syntaxTree"
import { type AnalysisResult, createAnalysisResult, type Issue, NO_FIX } from "@ferrule/core/types"

const FORMAT_MACROS = new Set(["format", "print", "println", "write", "writeln"])

function hasPositionalPlaceholder(body: Group): boolean {
  let found = false
  walk(body.children, (node) => {
    if (node.kind === "token" && node.type === "literal" && node.text.includes("{}")) {
      found = true
    }
  })
  return found
}

function hasComma(body: Group): boolean {
  let found = false
  walk(body.children, (node) => {
    if (isPunct(node, ",")) found = true
  })
  return found
}

function isFormatMacro(node: TokenTree, siblings: TokenTree[], index: number): boolean {
  return (
    isIdent(node) &&
    FORMAT_MACROS.has(node.text) &&
    !isPunct(siblings[index - 1], "::") &&
    isPunct(siblings[index + 1], "!")
  )
}

/**
 * Flags formatting macros that use positional `{}` placeholders with trailing arguments, such as
 * `println!("{}", name)`, where inline named arguments (`println!("{name}")`) read better.
 */
export class FormatArgsAnalyzer implements Analyzer {
  readonly name = "format_args"

  analyze(tree: SyntaxTree, _source: string): AnalysisResult {
    const issues: Issue[] = []

    walk(tree.items, (node, siblings, index) => {
      if (!isFormatMacro(node, siblings, index)) return

      const body = siblings[index + 2]
      if (isGroup(body) && hasPositionalPlaceholder(body) && hasComma(body)) {
        const head = firstToken(node)
        issues.push({
          line: head.line,
          column: head.column,
          message: "Use named format arguments instead of positional",
          fix: NO_FIX,
        })
      }
    })

    return createAnalysisResult(issues)
  }

  fix(): number {
    return 0
  }
}
