import { describe, it, expect } from "vitest"

import { getAnalyzers } from "@ferrule/core/analyzers/index"
import { PathImportAnalyzer } from "@ferrule/core/analyzers/PathImportAnalyzer"
import { applyEntries } from "@ferrule/core/applyEntries"
import { generateDiffForSource } from "@ferrule/core/diffGenerator"
import { parse, unparse } from "@ferrule/core/syntaxTree"
import type { DiffEntry } from "@ferrule/core/types"

const applyAll = (source: string) =>
  applyEntries(source, generateDiffForSource("lib.rs", source, getAnalyzers()).entries)

const fixAll = (source: string) => {
  const tree = parse(source)
  new PathImportAnalyzer().fix(tree)
  return unparse(tree)
}

describe("applyEntries", () => {
  it("should produce the previewed line below the inserted import", () => {
    const source = 'fn main() { let x = std::fs::read_to_string("f"); }\n'
    const { entries } = generateDiffForSource("main.rs", source, getAnalyzers())

    const result = applyEntries(source, entries)

    expect(result).toBe(
      'use std::fs::read_to_string;\nfn main() { let x = read_to_string("f"); }\n'
    )
    expect(result.split("\n")[entries[0].line]).toBe(entries[0].modified)
  })

  it("should insert grouped imports after inner attributes and module docs", () => {
    const source = [
      "//! Crate docs",
      "#![allow(unused)]",
      "",
      "fn a() {",
      "    std::mem::drop(1);",
      "    core::mem::swap(&mut x, &mut y);",
      "}",
      "",
    ].join("\n")
    const { entries } = generateDiffForSource("lib.rs", source, getAnalyzers())

    expect(applyEntries(source, entries)).toBe(
      [
        "//! Crate docs",
        "#![allow(unused)]",
        "use core::mem::swap;",
        "use std::mem::drop;",
        "",
        "fn a() {",
        "    drop(1);",
        "    swap(&mut x, &mut y);",
        "}",
        "",
      ].join("\n")
    )
  })

  it("should insert imports below inner attributes separated from the docs by a blank line", () => {
    const source = "//! Crate docs\n\n#![allow(dead_code)]\nfn main() { std::process::exit(0); }\n"

    expect(applyAll(source)).toBe(
      "//! Crate docs\n\n#![allow(dead_code)]\nuse std::process::exit;\nfn main() { exit(0); }\n"
    )
    expect(applyAll(source)).toBe(fixAll(source))
  })

  it("should insert imports after a multi-line inner attribute", () => {
    const source = "#![allow(\n    dead_code\n)]\nfn main() { std::process::exit(0); }"

    expect(applyAll(source)).toBe(
      "#![allow(\n    dead_code\n)]\nuse std::process::exit;\nfn main() { exit(0); }"
    )
  })

  it("should apply every accepted fix on a shared line", () => {
    const source = 'fn main() { let a = std::env::args(); let b = std::env::var("X"); }\n'

    expect(applyAll(source)).toBe(
      'use std::env::{args, var};\nfn main() { let a = args(); let b = var("X"); }\n'
    )
    expect(applyAll(source)).toBe(fixAll(source))
  })

  it("should drop the import of an edit that a whole-line change replaced", () => {
    const entries: DiffEntry[] = [
      {
        line: 1,
        analyzer: "path_import",
        original: "fn a() { std::fs::read(p); }",
        modified: "fn a() { read(p); }",
        description: "Use import instead of path: std::fs::read",
        import: "use std::fs::read;",
        edit: { searchPattern: "std::fs::read", replacement: "read" },
      },
      {
        line: 1,
        analyzer: "custom",
        original: "fn a() { std::fs::read(p); }",
        modified: "fn a() {}",
        description: "Replace the body",
      },
    ]

    expect(applyEntries("fn a() { std::fs::read(p); }", entries)).toBe("fn a() {}")
  })

  it("should not add an import that a grouped use already covers", () => {
    const source = "use std::fs::{self, read};\nfn a() { std::fs::read(p); }"

    expect(applyAll(source)).toBe("use std::fs::{self, read};\nfn a() { read(p); }")
  })

  it("should not add an import the file already has", () => {
    const entries: DiffEntry[] = [
      {
        line: 2,
        analyzer: "path_import",
        original: "fn a() { std::fs::read(p); }",
        modified: "fn a() { read(p); }",
        description: "Use import instead of path: std::fs::read",
        import: "use std::fs::read;",
      },
    ]

    expect(applyEntries("use std::fs::read;\nfn a() { std::fs::read(p); }", entries)).toBe(
      "use std::fs::read;\nfn a() { read(p); }"
    )
  })

  it("should keep CRLF line endings", () => {
    const entries: DiffEntry[] = [
      {
        line: 2,
        analyzer: "empty_lines",
        original: "    ",
        modified: "",
        description: "Empty line in function body indicates untamed complexity",
      },
    ]

    expect(applyEntries("fn a() {\r\n    \r\n}\r\n", entries)).toBe("fn a() {\r\n\r\n}\r\n")
  })

  it("should return the source unchanged without entries", () => {
    expect(applyEntries("fn a() {}\n", [])).toBe("fn a() {}\n")
  })
})
