import type { DuplicateKey } from "./duplicates.js"
import type { JsonKind } from "./node.js"

// CHANGE: define per-file check results and the aggregated report
// WHY: keep IO-free data structures reusable across CLI commands and tests
// FORMAT THEOREM: ∀r ∈ Report: r.stats.filesChecked = |r.files|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: FileResult._tag ∈ {"Valid","Invalid"}
// COMPLEXITY: O(1)/O(1)

export type FileResult =
  | {
    readonly _tag: "Valid"
    readonly file: string
    readonly rootKind: JsonKind
    readonly duplicates: ReadonlyArray<DuplicateKey>
  }
  | { readonly _tag: "Invalid"; readonly file: string; readonly line: number }

export interface CheckStats {
  readonly filesChecked: number
  readonly invalidFiles: number
  readonly duplicateKeys: number
}

export interface Report {
  readonly files: ReadonlyArray<FileResult>
  readonly stats: CheckStats
}
