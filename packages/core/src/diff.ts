import type { DiffEntry } from "@ferrule/core/types"

/**
 * Previewed changes for one file, in analyzer order and then issue order.
 */
export class FileDiff {
  readonly entries: DiffEntry[] = []

  constructor(readonly path: string) {}

  addEntry(entry: DiffEntry): void {
    this.entries.push(entry)
  }

  totalChanges(): number {
    return this.entries.length
  }
}

/**
 * Previewed changes across a run. Files without entries are never kept.
 */
export class DiffResult {
  readonly files: FileDiff[] = []

  addFile(fileDiff: FileDiff): void {
    if (fileDiff.totalChanges() > 0) {
      this.files.push(fileDiff)
    }
  }

  totalChanges(): number {
    return this.files.reduce((sum, file) => sum + file.totalChanges(), 0)
  }

  totalFiles(): number {
    return this.files.length
  }
}
