import os from "os"
import path from "path"

import fs from "fs-extra"
import { describe, it, expect, beforeEach, afterEach } from "vitest"

import type { Analyzer } from "@ferrule/core/analyzer"
import { getAnalyzers } from "@ferrule/core/analyzers/index"
import { generateDiff, generateDiffForSource } from "@ferrule/core/diffGenerator"
import { IoError, ParseError } from "@ferrule/core/errors"
import { createAnalysisResult, type Issue, simpleFix } from "@ferrule/core/types"

const fixedAnalyzer = (issues: Issue[]): Analyzer => ({
  name: "fixed",
  analyze: () => createAnalysisResult(issues),
  fix: () => 0,
})

describe("generateDiffForSource", () => {
  it("should preview a path import fix", () => {
    const source = 'fn main() { let x = std::fs::read_to_string("f"); }'

    const fileDiff = generateDiffForSource("main.rs", source, getAnalyzers())

    expect(fileDiff.path).toBe("main.rs")
    expect(fileDiff.entries).toEqual([
      {
        line: 1,
        analyzer: "path_import",
        original: source,
        modified: 'fn main() { let x = read_to_string("f"); }',
        description: "Use import instead of path: std::fs::read_to_string",
        import: "use std::fs::read_to_string;",
        edit: { searchPattern: "std::fs::read_to_string", replacement: "read_to_string" },
      },
    ])
  })

  it("should list entries in analyzer order and skip issues without a fix", () => {
    const source = [
      "fn main() {",
      "    let a = std::env::args();",
      "",
      "    // note",
      '    println!("{}", a.len());',
      "}",
    ].join("\n")

    const fileDiff = generateDiffForSource("main.rs", source, getAnalyzers())

    expect(fileDiff.entries.map((e) => [e.analyzer, e.line, e.modified])).toEqual([
      ["path_import", 2, "    let a = args();"],
      ["empty_lines", 3, ""],
    ])
  })

  it("should replace only the first occurrence of the pattern", () => {
    const analyzer = fixedAnalyzer([
      {
        line: 1,
        column: 1,
        message: "Use import instead of path: a::b::c",
        fix: {
          kind: "withImport",
          importStatement: "use a::b::c;",
          searchPattern: "a::b::c",
          replacement: "c$&",
        },
      },
    ])

    const fileDiff = generateDiffForSource("x.rs", "a::b::c(); a::b::c();", [analyzer])

    expect(fileDiff.entries[0].modified).toBe("c$&(); a::b::c();")
  })

  it("should skip unlocated issues", () => {
    const analyzer = fixedAnalyzer([
      { line: 0, column: 0, message: "somewhere", fix: simpleFix("x") },
    ])

    expect(generateDiffForSource("x.rs", "fn a() {}", [analyzer]).totalChanges()).toBe(0)
  })

  it("should use an empty original for lines past the end of the file", () => {
    const analyzer = fixedAnalyzer([{ line: 5, column: 1, message: "late", fix: simpleFix("y") }])

    expect(generateDiffForSource("x.rs", "fn a() {}", [analyzer]).entries[0].original).toBe("")
  })

  it("should raise a parse error carrying the path", () => {
    let error: unknown
    try {
      generateDiffForSource("broken.rs", "fn main() { invalid syntax +++", getAnalyzers())
    } catch (e) {
      error = e
    }

    expect(error).toBeInstanceOf(ParseError)
    if (error instanceof ParseError) {
      expect(error.path).toBe("broken.rs")
      expect(error.message).toBe("Parse error in broken.rs at 1:11: unclosed delimiter `{`")
    }
  })
})

describe("generateDiff", () => {
  let testDir: string

  beforeEach(() => {
    testDir = path.join(os.tmpdir(), `test_repo_${Math.random().toString(36).substring(2)}`)
    fs.mkdirSync(testDir)
  })

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true, force: true })
    }
  })

  it("should read the file and leave it unchanged", async () => {
    const filePath = path.join(testDir, "main.rs")
    const source = 'fn main() { let x = std::fs::read_to_string("f"); }\n'
    fs.writeFileSync(filePath, source)

    const fileDiff = await generateDiff(filePath, getAnalyzers())

    expect(fileDiff.totalChanges()).toBe(1)
    expect(fs.readFileSync(filePath, "utf-8")).toBe(source)
  })

  it("should produce an empty diff for a clean file", async () => {
    const filePath = path.join(testDir, "main.rs")
    fs.writeFileSync(filePath, "fn main() {}\n")

    expect((await generateDiff(filePath, getAnalyzers())).totalChanges()).toBe(0)
  })

  it("should raise an IO error for a missing file", async () => {
    await expect(generateDiff(path.join(testDir, "missing.rs"), getAnalyzers())).rejects.toThrow(
      IoError
    )
  })
})
