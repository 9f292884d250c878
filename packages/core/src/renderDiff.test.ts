import { describe, it, expect } from "vitest"

import { FileDiff } from "@ferrule/core/diff"
import { renderFileBlock } from "@ferrule/core/renderDiff"

describe("renderFileBlock", () => {
  it("should render imports and entries grouped by analyzer", () => {
    const fileDiff = new FileDiff("src/main.rs")
    fileDiff.addEntry({
      line: 2,
      analyzer: "path_import",
      original: "    let a = std::env::args();",
      modified: "    let a = args();",
      description: "Use import instead of path: std::env::args",
      import: "use std::env::args;",
    })
    fileDiff.addEntry({
      line: 3,
      analyzer: "empty_lines",
      original: "",
      modified: "",
      description: "Empty line in function body indicates untamed complexity",
    })

    const block = renderFileBlock(fileDiff, false)

    expect(block.lines).toEqual([
      "File: src/main.rs",
      "─".repeat(40),
      "Imports (file top)",
      "+    use std::env::args;",
      "",
      "path_import (1 issues)",
      "",
      "Line 2",
      "-        let a = std::env::args();",
      "+        let a = args();",
      "",
      "",
      "empty_lines (1 issues)",
      "",
      "Line 3",
      "-    ",
      "+    ",
      "",
      "═".repeat(40),
    ])
    expect(block.width).toBe(40)
  })

  it("should group duplicate imports in the imports section", () => {
    const fileDiff = new FileDiff("lib.rs")
    for (const [line, name] of [
      [4, "read"],
      [9, "write"],
    ] as const) {
      fileDiff.addEntry({
        line,
        analyzer: "path_import",
        original: `std::fs::${name}(p);`,
        modified: `${name}(p);`,
        description: `Use import instead of path: std::fs::${name}`,
        import: `use std::fs::${name};`,
      })
    }

    const block = renderFileBlock(fileDiff, false)

    expect(block.lines.slice(2, 5)).toEqual([
      "Imports (file top)",
      "+    use std::fs::{read, write};",
      "",
    ])
    expect(block.lines[5]).toBe("path_import (2 issues)")
  })

  it("should measure width without color codes", () => {
    const fileDiff = new FileDiff(`src/${"nested/".repeat(8)}main.rs`)
    fileDiff.addEntry({
      line: 1,
      analyzer: "empty_lines",
      original: "",
      modified: "",
      description: "Empty line in function body indicates untamed complexity",
    })

    expect(renderFileBlock(fileDiff, true).width).toBe(renderFileBlock(fileDiff, false).width)
    expect(renderFileBlock(fileDiff, false).width).toBe("File: src/".length + 7 * 8 + 7)
  })
})
