import os from "os"
import path from "path"

import { IoError } from "@ferrule/core/errors"
import { formatReport } from "@ferrule/core/report"
import fs from "fs-extra"
import { describe, it, expect, beforeEach, afterEach } from "vitest"

import {
  createModRsIssue,
  findModRsIssues,
  fixAllModRs,
  fixModRs,
  modRsReport,
} from "@ferrule/cli/modRs"

describe("createModRsIssue", () => {
  it("should suggest a file named after the module directory", () => {
    expect(createModRsIssue(path.join("crate", "src", "net", "mod.rs"))).toEqual({
      path: path.join("crate", "src", "net", "mod.rs"),
      suggested: path.join("crate", "src", "net.rs"),
      message: "Use `net.rs` instead of `net/mod.rs` (modern module style)",
    })
  })

  it("should ignore other files and a mod.rs without a module directory", () => {
    expect(createModRsIssue(path.join("src", "lib.rs"))).toBeNull()
    expect(createModRsIssue("mod.rs")).toBeNull()
    expect(createModRsIssue("/mod.rs")).toBeNull()
  })
})

describe("modRsReport", () => {
  it("should report the move as a fixable issue on the first line", () => {
    const issue = createModRsIssue("src/net/mod.rs")
    if (!issue) throw new Error("expected an issue")

    expect(formatReport(modRsReport(issue))).toBe(
      [
        "Quality report for: src/net/mod.rs",
        "=",
        "",
        "[mod_rs]",
        "  1:1 - Use `net.rs` instead of `net/mod.rs` (modern module style)",
        "    Fix: src/net.rs",
        "",
        "Total issues: 1",
        "Fixable: 1",
        "",
      ].join("\n")
    )
  })
})

describe("mod.rs fixes", () => {
  let testDir: string

  const write = (relativePath: string, contents = "pub fn run() {}\n") => {
    const filePath = path.join(testDir, relativePath)
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, contents)
  }

  beforeEach(() => {
    testDir = path.join(os.tmpdir(), `test_repo_${Math.random().toString(36).substring(2)}`)
    fs.mkdirSync(testDir, { recursive: true })
  })

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true })
  })

  it("should find every mod.rs below the target", async () => {
    write("src/lib.rs")
    write("src/net/mod.rs")
    write("src/net/tcp/mod.rs")

    const issues = await findModRsIssues(testDir)

    expect(issues.map((issue) => issue.suggested)).toEqual([
      path.join(testDir, "src/net.rs"),
      path.join(testDir, "src/net/tcp.rs"),
    ])
  })

  it("should move the file and remove the emptied directory", async () => {
    write("src/util/mod.rs", "pub fn helper() {}\n")
    const issue = createModRsIssue(path.join(testDir, "src/util/mod.rs"))
    if (!issue) throw new Error("expected an issue")

    await fixModRs(issue)

    expect(fs.readFileSync(path.join(testDir, "src/util.rs"), "utf-8")).toBe(
      "pub fn helper() {}\n"
    )
    expect(fs.existsSync(path.join(testDir, "src/util"))).toBe(false)
  })

  it("should keep a directory that still holds submodules", async () => {
    write("src/net/mod.rs")
    write("src/net/tcp.rs")

    expect(await fixAllModRs(await findModRsIssues(testDir))).toBe(1)
    expect(fs.existsSync(path.join(testDir, "src/net.rs"))).toBe(true)
    expect(fs.readdirSync(path.join(testDir, "src/net"))).toEqual(["tcp.rs"])
  })

  it("should not overwrite an existing module file", async () => {
    write("src/net/mod.rs", "// nested\n")
    write("src/net.rs", "// flat\n")
    const issue = createModRsIssue(path.join(testDir, "src/net/mod.rs"))
    if (!issue) throw new Error("expected an issue")

    await expect(fixModRs(issue)).rejects.toThrow(IoError)
    expect(fs.readFileSync(path.join(testDir, "src/net.rs"), "utf-8")).toBe("// flat\n")
  })

  it("should keep moving the rest when one move fails", async () => {
    write("src/net/mod.rs", "// nested\n")
    write("src/net.rs", "// flat\n")
    write("src/util/mod.rs")
    const failed: string[] = []

    const moved = await fixAllModRs(await findModRsIssues(testDir), {
      onFileError: (filePath, error) => {
        expect(error).toBeInstanceOf(IoError)
        failed.push(filePath)
      },
    })

    expect(moved).toBe(1)
    expect(failed).toEqual([path.join(testDir, "src/net/mod.rs")])
    expect(fs.existsSync(path.join(testDir, "src/util.rs"))).toBe(true)
    expect(fs.existsSync(path.join(testDir, "src/net/mod.rs"))).toBe(true)
  })
})
