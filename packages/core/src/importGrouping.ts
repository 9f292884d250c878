import {
  isGroup,
  isIdent,
  isPunct,
  type SyntaxTree,
  type TokenTree,
} from "@ferrule/core/syntaxTree"

/**
 * Merge `use` statements that share a root crate into a single braced import, e.g.
 * `use std::fs::read;` and `use std::fs::write;` become `use std::fs::{read, write};`.
 *
 * Duplicates are removed and roots come out in alphabetical order. Every input import is still
 * covered by exactly one output line.
 */
export function groupImports(imports: string[]): string[] {
  const grouped = new Map<string, string[]>()

  for (const statement of new Set(imports)) {
    const body = importPath(statement)
    const separator = body.indexOf("::")
    const root = separator === -1 ? body : body.slice(0, separator)
    const path = separator === -1 ? "" : body.slice(separator + 2)

    const paths = grouped.get(root) ?? []
    if (!paths.includes(path)) paths.push(path)
    grouped.set(root, paths)
  }

  return [...grouped.keys()].sort().map((root) => formatGroup(root, grouped.get(root) ?? []))
}

/**
 * Longest run of leading `::` segments shared by every path. Empty for fewer than two paths.
 */
export function findCommonPrefix(paths: string[]): string {
  if (paths.length < 2) return ""

  const parts = paths.map((path) => path.split("::"))
  const minLength = Math.min(...parts.map((segments) => segments.length))
  const common: string[] = []

  for (let i = 0; i < minLength; i++) {
    const segment = parts[0][i]
    if (!parts.every((segments) => segments[i] === segment)) break
    common.push(segment)
  }

  return common.join("::")
}

/**
 * The path of a `use` statement, e.g. `std::fs::read` for `use std::fs::read;`.
 */
export function importPath(statement: string): string {
  let body = statement.trim()
  while (body.startsWith("use ")) body = body.slice(4).trimStart()
  while (body.endsWith(";")) body = body.slice(0, -1)
  return body.trim()
}

function formatGroup(root: string, paths: string[]): string {
  if (paths.length === 1) {
    return paths[0] ? `use ${root}::${paths[0]};` : `use ${root};`
  }

  const members = paths.map((path) => (path === "" ? "self" : path)).sort()
  const prefix = findCommonPrefix(members)

  // A prefix covering a whole member would leave an empty suffix, so keep at least one segment
  const shortest = Math.min(...members.map((member) => member.split("::").length))
  const prefixSegments = prefix ? prefix.split("::").slice(0, shortest - 1) : []

  if (prefixSegments.length === 0) {
    return `use ${root}::{${members.join(", ")}};`
  }

  const strip = prefixSegments.join("::") + "::"
  const suffixes = members.map((member) => member.slice(strip.length))
  return `use ${root}::${prefixSegments.join("::")}::{${suffixes.join(", ")}};`
}

/**
 * Paths brought into scope by the file's top-level `use` items, with braces expanded:
 * `use std::fs::{self, read};` gives `std::fs` and `std::fs::read`. Renamed imports are left out.
 */
export function importedPaths(tree: SyntaxTree): Set<string> {
  const paths = new Set<string>()
  const items = tree.items

  for (let i = 0; i < items.length; i++) {
    if (!isIdent(items[i], "use")) continue

    let end = i + 1
    while (end < items.length && !isPunct(items[end], ";")) end++
    collectUsePaths(items.slice(i + 1, end), [], paths)
    i = end
  }

  return paths
}

function collectUsePaths(nodes: TokenTree[], prefix: string[], paths: Set<string>): void {
  let segments = [...prefix]
  let renamed = false
  let grouped = false

  const finish = () => {
    if (!renamed && !grouped && segments.length > prefix.length) {
      const path = segments[segments.length - 1] === "self" ? segments.slice(0, -1) : segments
      if (path.length > 0) paths.add(path.join("::"))
    }
    segments = [...prefix]
    renamed = false
    grouped = false
  }

  for (const node of nodes) {
    if (isPunct(node, ",")) {
      finish()
    } else if (isIdent(node, "as")) {
      renamed = true
    } else if (isGroup(node, "{")) {
      collectUsePaths(node.children, segments, paths)
      grouped = true
    } else if (isIdent(node) && !renamed) {
      segments.push(node.text)
    }
  }
  finish()
}
