import os from "os"
import path from "path"

import { IoError } from "@ferrule/core/errors"
import { createLogger } from "@ferrule/core/logger"
import chalk from "chalk"
import fs from "fs-extra"
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"

import { runFix, runFormat } from "@ferrule/cli/commands/fix"

const SOURCE = 'fn main() {\n    let x = std::fs::read_to_string("f");\n}\n'
const FIXED = 'use std::fs::read_to_string;\nfn main() {\n    let x = read_to_string("f");\n}\n'

describe("fix", () => {
  let testDir: string
  let mainPath: string
  const context = { logger: createLogger() }

  beforeEach(() => {
    chalk.level = 0
    testDir = path.join(os.tmpdir(), `test_repo_${Math.random().toString(36).substring(2)}`)
    mainPath = path.join(testDir, "src", "main.rs")
    fs.mkdirSync(path.dirname(mainPath), { recursive: true })
    fs.writeFileSync(mainPath, SOURCE)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(testDir, { recursive: true, force: true })
  })

  it("should rewrite files with fixes applied", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})

    const summary = await runFix(
      { path: testDir, dryRun: false, analyzers: ["path_import"], ignore: [] },
      context
    )

    expect(summary).toEqual({ fixes: 1, files: 1, modRs: 0 })
    expect(fs.readFileSync(mainPath, "utf-8")).toBe(FIXED)
    expect(log.mock.calls).toEqual([[`Fixed 1 issues in ${mainPath}`]])
  })

  it("should leave files alone in a dry run", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    fs.mkdirSync(path.join(testDir, "src", "net"))
    fs.writeFileSync(path.join(testDir, "src", "net", "mod.rs"), "pub fn run() {}\n")

    const summary = await runFix({ path: testDir, dryRun: true, ignore: [] }, context)

    expect(summary).toEqual({ fixes: 1, files: 0, modRs: 1 })
    expect(fs.readFileSync(mainPath, "utf-8")).toBe(SOURCE)
    expect(fs.existsSync(path.join(testDir, "src", "net", "mod.rs"))).toBe(true)
    expect(log.mock.calls).toEqual([
      [
        `Would fix: ${path.join(testDir, "src", "net", "mod.rs")} -> ${path.join(testDir, "src", "net.rs")}`,
      ],
      [`Would fix 1 issues in ${mainPath}`],
    ])
  })

  it("should move mod.rs files when fixing everything", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    fs.mkdirSync(path.join(testDir, "src", "net"))
    fs.writeFileSync(path.join(testDir, "src", "net", "mod.rs"), "pub fn run() {}\n")

    const summary = await runFormat({ path: testDir, dryRun: false, ignore: [] }, context)

    expect(summary).toEqual({ fixes: 1, files: 1, modRs: 1 })
    expect(fs.readFileSync(path.join(testDir, "src", "net.rs"), "utf-8")).toBe("pub fn run() {}\n")
    expect(fs.readFileSync(mainPath, "utf-8")).toBe(FIXED)
  })

  it("should report a mod.rs that cannot move and still fix the other files", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    const modRsPath = path.join(testDir, "src", "net", "mod.rs")
    fs.mkdirSync(path.dirname(modRsPath))
    fs.writeFileSync(modRsPath, "pub fn run() {}\n")
    fs.writeFileSync(path.join(testDir, "src", "net.rs"), "pub fn run() {}\n")
    const onFileError = vi.fn()

    const summary = await runFix(
      { path: testDir, dryRun: false, ignore: [] },
      { ...context, hooks: { onFileError } }
    )

    expect(summary).toEqual({ fixes: 1, files: 1, modRs: 0 })
    expect(onFileError).toHaveBeenCalledTimes(1)
    expect(onFileError.mock.calls[0][0]).toBe(modRsPath)
    expect(onFileError.mock.calls[0][1]).toBeInstanceOf(IoError)
    expect(fs.existsSync(modRsPath)).toBe(true)
    expect(fs.readFileSync(mainPath, "utf-8")).toBe(FIXED)
    expect(log.mock.calls).toEqual([[`Fixed 1 issues in ${mainPath}`]])
  })

  it("should not write files without fixes", async () => {
    fs.writeFileSync(mainPath, "fn main() {}\n")
    const log = vi.spyOn(console, "log").mockImplementation(() => {})

    const summary = await runFix(
      { path: testDir, dryRun: false, analyzers: ["path_import"], ignore: [] },
      context
    )

    expect(summary).toEqual({ fixes: 0, files: 0, modRs: 0 })
    expect(log).not.toHaveBeenCalled()
  })
})
