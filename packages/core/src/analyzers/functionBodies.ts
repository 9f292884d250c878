import { isGroup, isIdent, isPunct, type SyntaxTree, walk } from "@ferrule/core/syntaxTree"

export interface BodySpan {
  /** Line of the opening brace */
  startLine: number
  /** Line of the closing brace */
  endLine: number
}

/**
 * Find the brace-delimited bodies of every `fn` in the tree, nested ones included.
 * Declarations without a body (trait methods, function pointer types) are skipped.
 */
export function findFunctionBodies(tree: SyntaxTree): BodySpan[] {
  const spans: BodySpan[] = []

  walk(tree.items, (node, siblings, index) => {
    if (!isIdent(node, "fn")) return

    for (let i = index + 1; i < siblings.length; i++) {
      const next = siblings[i]
      if (isPunct(next, ";")) break
      if (isGroup(next, "{")) {
        spans.push({ startLine: next.open.line, endLine: next.close.line })
        break
      }
    }
  })

  return spans
}

/**
 * Split source text into lines the way line numbers are counted by the parser.
 */
export function sourceLines(source: string): string[] {
  return source.split(/\r?\n/)
}
