import { Match } from "effect"
import * as Either from "effect/Either"

import { collectDuplicates, type DuplicateKey, formatPath } from "./duplicates.js"
import type { InvalidJson } from "./errors.js"
import type { JsonNode } from "./node.js"
import type { CheckStats, FileResult, Report } from "./types.js"

// CHANGE: build per-file results and render check reports
// WHY: keep reporting pure and deterministic across CLI commands
// FORMAT THEOREM: ∀r: exitCode(r) = 1 ⇔ r.stats.invalidFiles > 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: files keep the order in which they were checked
// COMPLEXITY: O(n)

/**
 * Turn a decoding outcome into a per-file result.
 *
 * @pure true
 * @complexity O(n) where n = node count
 */
export const toFileResult = (
  file: string,
  decoded: Either.Either<JsonNode, InvalidJson>
): FileResult =>
  Either.match(decoded, {
    onLeft: (error): FileResult => ({ _tag: "Invalid", file, line: error.line }),
    onRight: (root): FileResult => ({
      _tag: "Valid",
      file,
      rootKind: root.kind,
      duplicates: collectDuplicates(root)
    })
  })

const duplicateCount = (result: FileResult): number => result._tag === "Valid" ? result.duplicates.length : 0

const buildStats = (files: ReadonlyArray<FileResult>): CheckStats => ({
  filesChecked: files.length,
  invalidFiles: files.filter((result) => result._tag === "Invalid").length,
  duplicateKeys: files.reduce((total, result) => total + duplicateCount(result), 0)
})

export const buildReport = (files: ReadonlyArray<FileResult>): Report => ({
  files,
  stats: buildStats(files)
})

/**
 * Exit code of a check run.
 *
 * @returns 1 when a file is invalid, 2 when duplicates are fatal and present, else 0.
 *
 * @pure true
 * @complexity O(1)
 */
export const exitCodeFor = (report: Report, failOnDuplicates: boolean): number => {
  if (report.stats.invalidFiles > 0) {
    return 1
  }
  return failOnDuplicates && report.stats.duplicateKeys > 0 ? 2 : 0
}

const formatDuplicate = (duplicate: DuplicateKey): string =>
  `duplicate key ${formatPath([...duplicate.path, duplicate.key])} at line ${
    duplicate.duplicateLines.join(", ")
  } (first at line ${duplicate.firstLine})`

export const formatFileResult = (result: FileResult): ReadonlyArray<string> =>
  Match.value(result).pipe(
    Match.tag("Valid", (value) => [
      `[valid] ${value.file} (${value.rootKind})`,
      ...value.duplicates.map((duplicate) => `  - ${formatDuplicate(duplicate)}`)
    ]),
    Match.tag("Invalid", (value) => [`[invalid] ${value.file}: Invalid JSON at line ${value.line}`]),
    Match.exhaustive
  )

/**
 * Render a human-readable report.
 *
 * @param report - Report data.
 * @returns Multi-line string for stdout.
 *
 * @pure true
 * @invariant last line carries the stats
 * @complexity O(n)
 */
export const renderHumanReport = (report: Report): string => {
  const stats = report.stats
  return [
    ...report.files.flatMap((result) => formatFileResult(result)),
    `Stats: filesChecked=${stats.filesChecked}, invalidFiles=${stats.invalidFiles}, duplicateKeys=${stats.duplicateKeys}`
  ].join("\n")
}

const toJsonResult = (result: FileResult) =>
  Match.value(result).pipe(
    Match.tag("Valid", (value) => ({
      file: value.file,
      status: "valid" as const,
      rootKind: value.rootKind,
      duplicates: value.duplicates.map((duplicate) => ({
        path: formatPath(duplicate.path),
        key: duplicate.key,
        firstLine: duplicate.firstLine,
        duplicateLines: duplicate.duplicateLines
      }))
    })),
    Match.tag("Invalid", (value) => ({
      file: value.file,
      status: "invalid" as const,
      line: value.line
    })),
    Match.exhaustive
  )

/**
 * Render report as JSON text.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderJsonReport = (report: Report): string =>
  JSON.stringify(
    {
      files: report.files.map((result) => toJsonResult(result)),
      stats: report.stats
    },
    null,
    2
  )
