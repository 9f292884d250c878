import { spawn } from "child_process"

import { IoError } from "@ferrule/core/errors"

// rustfmt settings applied by `ferrule fmt`
export const RUSTFMT_CONFIG = {
  trailing_comma: "Never",
  brace_style: "SameLineWhere",
  struct_field_align_threshold: 20,
  wrap_comments: true,
  format_code_in_doc_comments: true,
  struct_lit_single_line: false,
  max_width: 99,
  imports_granularity: "Crate",
  group_imports: "StdExternalCrate",
  reorder_imports: true,
  unstable_features: true,
} as const

/**
 * Arguments for `cargo`, one `--config key=value` pair per setting.
 */
export function rustfmtArgs(): string[] {
  return [
    "+nightly",
    "fmt",
    "--",
    ...Object.entries(RUSTFMT_CONFIG).flatMap(([key, value]) => ["--config", `${key}=${value}`]),
  ]
}

/**
 * Run `cargo +nightly fmt` with the project's rustfmt settings in `cwd`.
 *
 * @throws IoError when cargo cannot be started or exits with a failure
 */
export function formatCode(cwd: string = process.cwd(), command: string = "cargo"): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const child = spawn(command, rustfmtArgs(), { stdio: "inherit", cwd })

    child.on("error", (error) => {
      reject(new IoError(`failed to run ${command}: ${error.message}`, { cause: error }))
    })

    child.on("close", (code) => {
      if (code === 0) {
        resolve()
      } else {
        reject(new IoError(`cargo fmt failed with status: ${code}`))
      }
    })
  })
}
