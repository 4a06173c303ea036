import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parseText } from "../../src/core/parse.js"
import { buildReport, exitCodeFor, renderHumanReport, renderJsonReport, toFileResult } from "../../src/core/report.js"

const validWithDuplicate = toFileResult("a.json", parseText(`{"a":1,"a":2}`))
const invalid = toFileResult("b.json", parseText("[1,"))
const clean = toFileResult("c.json", parseText("[true]"))

describe("toFileResult", () => {
  it.effect("maps decoding outcomes to tagged results", () =>
    Effect.sync(() => {
      expect(validWithDuplicate).toEqual({
        _tag: "Valid",
        file: "a.json",
        rootKind: "Object",
        duplicates: [{ path: [], key: "a", firstLine: 1, duplicateLines: [1] }]
      })
      expect(invalid).toEqual({ _tag: "Invalid", file: "b.json", line: 1 })
    }))
})

describe("buildReport", () => {
  it.effect("aggregates stats", () =>
    Effect.sync(() => {
      expect(buildReport([validWithDuplicate, invalid, clean]).stats).toEqual({
        filesChecked: 3,
        invalidFiles: 1,
        duplicateKeys: 1
      })
    }))
})

describe("exitCodeFor", () => {
  it.effect("ranks invalid files above fatal duplicates", () =>
    Effect.sync(() => {
      expect(exitCodeFor(buildReport([validWithDuplicate, invalid]), true)).toBe(1)
      expect(exitCodeFor(buildReport([validWithDuplicate]), true)).toBe(2)
      expect(exitCodeFor(buildReport([validWithDuplicate]), false)).toBe(0)
      expect(exitCodeFor(buildReport([clean]), true)).toBe(0)
    }))
})

describe("renderHumanReport", () => {
  it.effect("lists each file, its duplicates and the stats line", () =>
    Effect.sync(() => {
      expect(renderHumanReport(buildReport([validWithDuplicate, invalid]))).toBe(
        [
          "[valid] a.json (Object)",
          "  - duplicate key $.a at line 1 (first at line 1)",
          "[invalid] b.json: Invalid JSON at line 1",
          "Stats: filesChecked=2, invalidFiles=1, duplicateKeys=1"
        ].join("\n")
      )
    }))
})

describe("renderJsonReport", () => {
  it.effect("renders files with status and formatted paths", () =>
    Effect.sync(() => {
      const rendered: unknown = JSON.parse(renderJsonReport(buildReport([validWithDuplicate, invalid])))
      expect(rendered).toEqual({
        files: [
          {
            file: "a.json",
            status: "valid",
            rootKind: "Object",
            duplicates: [{ path: "$", key: "a", firstLine: 1, duplicateLines: [1] }]
          },
          { file: "b.json", status: "invalid", line: 1 }
        ],
        stats: { filesChecked: 2, invalidFiles: 1, duplicateKeys: 1 }
      })
    }))
})
