/**
 * Lossless token-tree parser for Rust sources.
 *
 * Source text is split into tokens, whitespace and comments are kept as the `leading` trivia of
 * the token that follows them, and bracketed regions become nested groups. `unparse` of an
 * unmodified tree gives back the exact source.
 */

import { ParseError } from "@ferrule/core/errors"

export type TokenType = "ident" | "lifetime" | "literal" | "punct"

export interface Token {
  kind: "token"
  type: TokenType
  text: string
  /** Whitespace and comments preceding the token */
  leading: string
  /** 1-based line of the first character, as parsed */
  line: number
  /** 1-based column of the first character, as parsed */
  column: number
}

export type Delimiter = "(" | "[" | "{"

export interface Group {
  kind: "group"
  delimiter: Delimiter
  open: Token
  close: Token
  children: TokenTree[]
}

export type TokenTree = Token | Group

export interface SyntaxTree {
  items: TokenTree[]
  /** Trivia after the last token */
  trailing: string
}

const CLOSING: Record<Delimiter, string> = { "(": ")", "[": "]", "{": "}" }

const IDENT_START = /[\p{L}_]/u
const IDENT_CONTINUE = /[\p{L}\p{N}_]/u

function isDelimiter(text: string): text is Delimiter {
  return text === "(" || text === "[" || text === "{"
}

function isClosing(text: string): boolean {
  return text === ")" || text === "]" || text === "}"
}

class Lexer {
  private pos = 0
  private line = 1
  private column = 1
  trailing = ""

  constructor(private readonly source: string) {}

  next(): Token | null {
    const leading = this.readTrivia()
    if (this.pos >= this.source.length) {
      this.trailing = leading
      return null
    }

    const line = this.line
    const column = this.column
    const start = this.pos
    const type = this.scanToken(line, column)

    return { kind: "token", type, text: this.source.slice(start, this.pos), leading, line, column }
  }

  private peek(offset: number = 0): string {
    return this.source[this.pos + offset] ?? ""
  }

  private atEnd(): boolean {
    return this.pos >= this.source.length
  }

  private advance(count: number = 1): void {
    const text = this.source.slice(this.pos, this.pos + count)
    for (const ch of text) {
      if (ch === "\n") {
        this.line += 1
        this.column = 1
      } else {
        this.column += 1
      }
    }
    this.pos += text.length
  }

  private readTrivia(): string {
    const start = this.pos

    while (!this.atEnd()) {
      const ch = this.peek()
      if (/\s/.test(ch)) {
        this.advance()
      } else if (ch === "/" && this.peek(1) === "/") {
        while (!this.atEnd() && this.peek() !== "\n") this.advance()
      } else if (ch === "/" && this.peek(1) === "*") {
        this.skipBlockComment()
      } else {
        break
      }
    }

    return this.source.slice(start, this.pos)
  }

  // Block comments nest in Rust
  private skipBlockComment(): void {
    const line = this.line
    const column = this.column
    let depth = 0

    do {
      if (this.atEnd()) {
        throw new ParseError("unterminated block comment", { line, column })
      }
      if (this.peek() === "/" && this.peek(1) === "*") {
        this.advance(2)
        depth += 1
      } else if (this.peek() === "*" && this.peek(1) === "/") {
        this.advance(2)
        depth -= 1
      } else {
        this.advance()
      }
    } while (depth > 0)
  }

  private scanToken(line: number, column: number): TokenType {
    const ch = this.peek()

    if (ch === "b" || ch === "r") {
      const prefixed = this.scanPrefixed(line, column)
      if (prefixed) return prefixed
    }

    if (IDENT_START.test(ch)) {
      this.readIdent()
      return "ident"
    }

    if (/[0-9]/.test(ch)) {
      this.readNumber()
      return "literal"
    }

    if (ch === '"') {
      this.readQuoted('"', line, column)
      return "literal"
    }

    if (ch === "'") {
      return this.readQuoteOrLifetime(line, column)
    }

    if (ch === ":" && this.peek(1) === ":") {
      this.advance(2)
      return "punct"
    }

    this.advance()
    return "punct"
  }

  /**
   * Raw identifiers (`r#type`), raw strings (`r"…"`, `r#"…"#`), byte strings and byte chars.
   */
  private scanPrefixed(line: number, column: number): TokenType | null {
    const offset = this.peek() === "b" ? 1 : 0

    if (this.peek(offset) === "r") {
      let hashes = 0
      while (this.peek(offset + 1 + hashes) === "#") hashes++

      if (this.peek(offset + 1 + hashes) === '"') {
        this.advance(offset + 2 + hashes)
        this.readRawStringBody(hashes, line, column)
        return "literal"
      }

      if (offset === 0 && hashes === 1 && IDENT_START.test(this.peek(2))) {
        this.advance(2)
        this.readIdent()
        return "ident"
      }

      return null
    }

    if (offset === 1 && (this.peek(1) === '"' || this.peek(1) === "'")) {
      const quote = this.peek(1)
      this.advance()
      this.readQuoted(quote, line, column)
      return "literal"
    }

    return null
  }

  private readIdent(): void {
    while (!this.atEnd() && IDENT_CONTINUE.test(this.peek())) this.advance()
  }

  private readNumber(): void {
    while (!this.atEnd()) {
      const ch = this.peek()
      if (/[0-9A-Za-z_]/.test(ch)) {
        this.advance()
      } else if (ch === "." && /[0-9]/.test(this.peek(1))) {
        this.advance()
      } else {
        break
      }
    }
  }

  private readQuoted(quote: string, line: number, column: number): void {
    this.advance()

    for (;;) {
      if (this.atEnd()) {
        const what = quote === '"' ? "string" : "character"
        throw new ParseError(`unterminated ${what} literal`, { line, column })
      }

      const ch = this.peek()
      if (ch === "\\") {
        this.advance(2)
      } else if (ch === quote) {
        this.advance()
        return
      } else {
        this.advance()
      }
    }
  }

  private readRawStringBody(hashes: number, line: number, column: number): void {
    const terminator = '"' + "#".repeat(hashes)

    for (;;) {
      if (this.atEnd()) {
        throw new ParseError("unterminated raw string", { line, column })
      }
      if (this.source.startsWith(terminator, this.pos)) {
        this.advance(terminator.length)
        return
      }
      this.advance()
    }
  }

  private readQuoteOrLifetime(line: number, column: number): TokenType {
    if (this.peek(1) === "\\") {
      this.readQuoted("'", line, column)
      return "literal"
    }

    const codePoint = this.source.codePointAt(this.pos + 1)
    const width = codePoint !== undefined && codePoint > 0xffff ? 2 : 1
    if (codePoint !== undefined && this.source[this.pos + 1 + width] === "'") {
      this.advance(2 + width)
      return "literal"
    }

    if (IDENT_START.test(this.peek(1))) {
      this.advance()
      this.readIdent()
      return "lifetime"
    }

    throw new ParseError("unterminated character literal", { line, column })
  }
}

/**
 * Parse Rust source text into a token tree.
 *
 * @throws ParseError on unterminated literals or comments and unbalanced delimiters
 */
export function parse(source: string): SyntaxTree {
  const lexer = new Lexer(source)
  const root: TokenTree[] = []
  const stack: { delimiter: Delimiter; open: Token; children: TokenTree[] }[] = []
  let current = root

  for (let token = lexer.next(); token; token = lexer.next()) {
    const text = token.text
    if (token.type === "punct" && isDelimiter(text)) {
      const frame = { delimiter: text, open: token, children: [] as TokenTree[] }
      stack.push(frame)
      current = frame.children
      continue
    }

    if (token.type === "punct" && isClosing(text)) {
      const frame = stack.pop()
      if (!frame) {
        throw new ParseError(`unexpected closing delimiter \`${token.text}\``, token)
      }
      if (CLOSING[frame.delimiter] !== text) {
        throw new ParseError(
          `mismatched closing delimiter: expected \`${CLOSING[frame.delimiter]}\`, found \`${text}\``,
          token
        )
      }

      current = stack.length > 0 ? stack[stack.length - 1].children : root
      current.push({
        kind: "group",
        delimiter: frame.delimiter,
        open: frame.open,
        close: token,
        children: frame.children,
      })
      continue
    }

    current.push(token)
  }

  const unclosed = stack.pop()
  if (unclosed) {
    throw new ParseError(`unclosed delimiter \`${unclosed.delimiter}\``, unclosed.open)
  }

  return { items: root, trailing: lexer.trailing }
}

/**
 * Print a token tree back to source text.
 */
export function unparse(tree: SyntaxTree): string {
  const parts: string[] = []

  const emit = (trees: TokenTree[]) => {
    for (const node of trees) {
      if (node.kind === "token") {
        parts.push(node.leading, node.text)
      } else {
        parts.push(node.open.leading, node.open.text)
        emit(node.children)
        parts.push(node.close.leading, node.close.text)
      }
    }
  }

  emit(tree.items)
  parts.push(tree.trailing)

  return parts.join("")
}

/**
 * Called for every node; returning `false` skips the children of a group.
 */
export type Visitor = (
  node: TokenTree,
  siblings: TokenTree[],
  index: number,
  parents: Group[]
) => boolean | void

export function walk(trees: TokenTree[], visit: Visitor, parents: Group[] = []): void {
  for (let index = 0; index < trees.length; index++) {
    const node = trees[index]
    const descend = visit(node, trees, index, parents)
    if (node.kind === "group" && descend !== false) {
      walk(node.children, visit, [...parents, node])
    }
  }
}

export function isPunct(node: TokenTree | undefined, text: string): node is Token & { type: "punct" } {
  return node?.kind === "token" && node.type === "punct" && node.text === text
}

export function isIdent(node: TokenTree | undefined, text?: string): node is Token & { type: "ident" } {
  return (
    node?.kind === "token" && node.type === "ident" && (text === undefined || node.text === text)
  )
}

export function isGroup(node: TokenTree | undefined, delimiter?: Delimiter): node is Group {
  return node?.kind === "group" && (delimiter === undefined || node.delimiter === delimiter)
}

export function firstToken(node: TokenTree): Token {
  return node.kind === "token" ? node : node.open
}

/**
 * Index of the first item after the file's leading `#![...]` inner attributes.
 */
export function innerAttributesEnd(items: TokenTree[]): number {
  let index = 0
  while (
    isPunct(items[index], "#") &&
    isPunct(items[index + 1], "!") &&
    isGroup(items[index + 2], "[")
  ) {
    index += 3
  }
  return index
}

/**
 * Insert statements such as `use` items at the top of the file, after any inner attributes.
 * The inserted tokens carry no meaningful positions.
 */
export function insertLeadingStatements(tree: SyntaxTree, statements: string[]): void {
  if (statements.length === 0) return

  const inserted = parse(statements.join("\n")).items
  const items = tree.items
  const index = innerAttributesEnd(items)

  const head = firstToken(inserted[0])
  const anchor = items[index]

  if (index > 0) {
    head.leading = "\n"
  } else if (anchor) {
    const anchorToken = firstToken(anchor)
    head.leading = anchorToken.leading
    anchorToken.leading = "\n"
  } else {
    head.leading = ""
    tree.trailing = tree.trailing.length > 0 ? tree.trailing : "\n"
  }

  items.splice(index, 0, ...inserted)
}
