#!/usr/bin/env node

import fs from "fs"
import { builtinModules } from "module"
import { dirname, resolve } from "path"
import { fileURLToPath } from "url"

import * as esbuild from "esbuild"
import { z } from "zod"

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

// Read package.json to get dependencies
const packageJson = z
  .object({ dependencies: z.record(z.string()).default({}) })
  .parse(JSON.parse(fs.readFileSync(resolve(__dirname, "package.json"), "utf8")))
const dependencies = Object.keys(packageJson.dependencies)

// Filter out our internal packages so they get bundled
const externalDeps = dependencies.filter((dep) => !dep.startsWith("@ferrule/"))

// Node.js built-in modules that should not be bundled
const nodeBuiltins = [...builtinModules, ...builtinModules.map((name) => `node:${name}`)]

async function build() {
  console.log("Building CLI with esbuild...")

  try {
    await esbuild.build({
      entryPoints: [resolve(__dirname, "src/run.ts")],
      bundle: true,
      platform: "node",
      target: "node20",
      outfile: resolve(__dirname, "dist/run.js"),
      format: "esm",
      banner: { js: "#!/usr/bin/env node" },
      jsx: "automatic",
      external: [...externalDeps, ...nodeBuiltins],
      minify: false,
      sourcemap: false,
    })

    // Make the output file executable
    fs.chmodSync(resolve(__dirname, "dist/run.js"), "755")

    console.log("Build complete!")
  } catch (error) {
    console.error("Build failed:", error)
    process.exit(1)
  }
}

void build()
