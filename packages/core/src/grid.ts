import stringWidth from "string-width"

import type { RenderedBlock } from "@ferrule/core/types"

/** Horizontal space between grid columns */
export const COLUMN_GAP = 4

/** Narrowest width a block is laid out with */
export const MIN_BLOCK_WIDTH = 40

/**
 * Terminal columns taken by `text`, ignoring ANSI escape sequences.
 */
export function visibleWidth(text: string): number {
  return stringWidth(text)
}

/**
 * Right-pad `text` with spaces to a visible width. Longer text is returned as is.
 */
export function padToWidth(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - visibleWidth(text)))
}

/**
 * Wrap rendered lines into a block whose width is their widest visible line, floored at
 * {@link MIN_BLOCK_WIDTH}.
 */
export function toBlock(lines: string[]): RenderedBlock {
  return { lines, width: Math.max(MIN_BLOCK_WIDTH, ...lines.map(visibleWidth)) }
}

/**
 * Most columns of equally wide blocks that fit the terminal, at least 1.
 */
export function calculateColumns(blocks: RenderedBlock[], terminalWidth: number): number {
  if (blocks.length === 0) return 1

  const maxWidth = Math.max(MIN_BLOCK_WIDTH, ...blocks.map((block) => block.width))

  for (let cols = blocks.length; cols >= 1; cols--) {
    if (cols * maxWidth + (cols - 1) * COLUMN_GAP <= terminalWidth) {
      return cols
    }
  }

  return 1
}

/**
 * Lay blocks out in rows of `columns`. Each row of blocks is followed by a blank line.
 */
export function renderGrid(blocks: RenderedBlock[], columns: number): string[] {
  const output: string[] = []
  if (blocks.length === 0) return output

  if (columns <= 1) {
    for (const block of blocks) {
      output.push(...block.lines, "")
    }
    return output
  }

  const columnWidth = Math.max(...blocks.map((block) => block.width))
  const gap = " ".repeat(COLUMN_GAP)

  for (let start = 0; start < blocks.length; start += columns) {
    const chunk = blocks.slice(start, start + columns)
    const rows = Math.max(...chunk.map((block) => block.lines.length))

    for (let row = 0; row < rows; row++) {
      output.push(chunk.map((block) => padToWidth(block.lines[row] ?? "", columnWidth)).join(gap))
    }
    output.push("")
  }

  return output
}
