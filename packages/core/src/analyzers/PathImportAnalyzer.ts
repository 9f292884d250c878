import type { Analyzer } from "@ferrule/core/analyzer"
import { groupImports, importedPaths } from "@ferrule/core/importGrouping"
import {
  insertLeadingStatements,
  isGroup,
  isIdent,
  isPunct,
  type SyntaxTree,
  type Token,
  type TokenTree,
} from "@ferrule/core/syntaxTree"
import {
  type AnalysisResult,
  createAnalysisResult,
  importFix,
  type Issue,
} from "@ferrule/core/types"

const STDLIB_ROOTS = new Set(["std", "core", "alloc"])

interface PathMatch {
  siblings: TokenTree[]
  index: number
  segments: Token[]
}

function startsUppercase(name: string): boolean {
  const first = name.replace(/^r#/, "").charAt(0)
  return first !== "" && first === first.toUpperCase() && first !== first.toLowerCase()
}

function isScreamingSnakeCase(name: string): boolean {
  return /^[\p{Lu}\p{N}_]+$/u.test(name)
}

/**
 * Decide whether a path names a free function or module item worth importing, as opposed to an
 * associated item on a type, an enum variant or a constant.
 */
export function shouldExtractToImport(segments: string[]): boolean {
  if (segments.length < 2) return false

  const first = segments[0]
  const last = segments[segments.length - 1]
  const secondToLast = segments[segments.length - 2]

  if (startsUppercase(first)) return false
  if (isScreamingSnakeCase(last) || startsUppercase(last)) return false
  if (startsUppercase(secondToLast)) return false

  return STDLIB_ROOTS.has(first) || segments.length >= 3
}

/**
 * Collect `a::b::c` chains in expression position. `use` items, attributes and macro bodies are
 * not descended into.
 */
function findPaths(items: TokenTree[]): PathMatch[] {
  const matches: PathMatch[] = []

  const scan = (siblings: TokenTree[]) => {
    let i = 0
    while (i < siblings.length) {
      const node = siblings[i]

      if (isIdent(node, "use")) {
        while (i < siblings.length && !isPunct(siblings[i], ";")) i++
        i++
        continue
      }

      if (isPunct(node, "#")) {
        const attr = isPunct(siblings[i + 1], "!") ? i + 2 : i + 1
        if (isGroup(siblings[attr], "[")) {
          i = attr + 1
          continue
        }
      }

      // name!(...), name![...], name!{...} and macro_rules! name {...}
      if (isIdent(node) && isPunct(siblings[i + 1], "!")) {
        let body = i + 2
        if (isIdent(siblings[body])) body++
        if (isGroup(siblings[body])) {
          i = body + 1
          continue
        }
      }

      if (node.kind === "group") {
        scan(node.children)
        i++
        continue
      }

      if (isIdent(node) && !isPunct(siblings[i - 1], "::")) {
        const segments = [node]
        let end = i + 1
        for (;;) {
          const separator = siblings[end]
          const next = siblings[end + 1]
          if (!isPunct(separator, "::") || !isIdent(next)) break
          segments.push(next)
          end += 2
        }

        if (segments.length > 1 && !isPunct(siblings[end], "!")) {
          matches.push({ siblings, index: i, segments })
        }
        i = end
        continue
      }

      i++
    }
  }

  scan(items)
  return matches
}

function selectCandidates(tree: SyntaxTree): PathMatch[] {
  return findPaths(tree.items).filter((match) =>
    shouldExtractToImport(match.segments.map((segment) => segment.text))
  )
}

function pathText(match: PathMatch): string {
  return match.segments.map((segment) => segment.text).join("::")
}

/**
 * Flags fully qualified calls such as `std::fs::read_to_string(...)` that read better with an
 * import, e.g. `use std::fs::read_to_string;` and `read_to_string(...)`.
 */
export class PathImportAnalyzer implements Analyzer {
  readonly name = "path_import"

  analyze(tree: SyntaxTree, _source: string): AnalysisResult {
    const issues: Issue[] = selectCandidates(tree).map((match) => {
      const path = pathText(match)
      const head = match.segments[0]
      const last = match.segments[match.segments.length - 1]

      return {
        line: head.line,
        column: head.column,
        message: `Use import instead of path: ${path}`,
        fix: importFix(`use ${path};`, path, last.text),
      }
    })

    return createAnalysisResult(issues)
  }

  fix(tree: SyntaxTree): number {
    const matches = selectCandidates(tree)
    if (matches.length === 0) return 0

    const existing = importedPaths(tree)
    const imports = matches
      .map(pathText)
      .filter((path) => !existing.has(path))
      .map((path) => `use ${path};`)

    // Later matches first so indices within a shared sibling list stay valid
    for (const match of [...matches].reverse()) {
      const head = match.segments[0]
      const last = match.segments[match.segments.length - 1]
      const replacement: Token = {
        ...last,
        leading: head.leading,
        line: head.line,
        column: head.column,
      }
      match.siblings.splice(match.index, match.segments.length * 2 - 1, replacement)
    }

    insertLeadingStatements(tree, groupImports(imports))
    return matches.length
  }
}
