import { groupImports, importedPaths, importPath } from "@ferrule/core/importGrouping"
import {
  firstToken,
  innerAttributesEnd,
  isGroup,
  parse,
  type SyntaxTree,
} from "@ferrule/core/syntaxTree"
import type { DiffEntry } from "@ferrule/core/types"

/**
 * 0-based line index where imports go: below the last inner attribute, otherwise right above
 * the first item so that leading comments stay on top. Matches where `fix` inserts them.
 */
function importInsertionLine(tree: SyntaxTree): number {
  const end = innerAttributesEnd(tree.items)
  const lastAttribute = tree.items[end - 1]
  if (end > 0 && isGroup(lastAttribute)) {
    return lastAttribute.close.line
  }

  const first = tree.items[0]
  return first ? firstToken(first).line - 1 : 0
}

/**
 * Apply previewed changes to source text. Each entry's line is replaced with its modified text,
 * or, for entries carrying an in-line edit, the edit is replayed on the line as it stands, so
 * several accepted fixes on one line all land. The imports of the edits that landed are grouped
 * and inserted after the file's inner attributes, leaving out paths the file already imports.
 *
 * An entry without an edit replaces the whole line and discards earlier edits to it.
 *
 * @throws ParseError when the source does not parse
 */
export function applyEntries(source: string, entries: DiffEntry[]): string {
  const eol = source.includes("\r\n") ? "\r\n" : "\n"
  const lines = source.split(/\r?\n/)
  const tree = parse(source)
  const insertAt = importInsertionLine(tree)
  const existing = importedPaths(tree)

  const importsByLine = new Map<number, string[]>()

  for (const entry of entries) {
    if (entry.line < 1 || entry.line > lines.length) continue
    const index = entry.line - 1

    if (!entry.edit) {
      lines[index] = entry.modified
      importsByLine.set(index, entry.import ? [entry.import] : [])
      continue
    }

    const { searchPattern, replacement } = entry.edit
    if (!lines[index].includes(searchPattern)) continue

    lines[index] = lines[index].replace(searchPattern, () => replacement)
    if (entry.import) {
      importsByLine.set(index, [...(importsByLine.get(index) ?? []), entry.import])
    }
  }

  const imports = groupImports(
    [...importsByLine.values()]
      .flat()
      .filter((statement) => !existing.has(importPath(statement)))
  )

  lines.splice(insertAt, 0, ...imports)

  return lines.join(eol)
}
