import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli } from "../../src/app/program.js"
import { provideNodeContext, withTempDir } from "./test-helpers.js"

const duplicated = `{"a": 1,\n"a": 2}`
const broken = `{\n"a": [1.2.3]\n}`

describe("check command", () => {
  it.scoped("reports invalid files by line and duplicates by key", () =>
    withTempDir(({ fixture }) =>
      Effect.gen(function*(_) {
        const valid = yield* _(fixture("valid.json", duplicated))
        const invalid = yield* _(fixture("invalid.json", broken))
        const result = yield* _(runCli(["node", "cli", "check", valid, invalid, "--silent"]))

        expect(result.exitCode).toBe(1)
        expect(result.report.files).toEqual([
          {
            _tag: "Valid",
            file: valid,
            rootKind: "Object",
            duplicates: [{ path: [], key: "a", firstLine: 1, duplicateLines: [2] }]
          },
          { _tag: "Invalid", file: invalid, line: 2 }
        ])
      })
    ).pipe(provideNodeContext))

  it.scoped("exits with 2 when duplicates are fatal", () =>
    withTempDir(({ fixture }) =>
      Effect.gen(function*(_) {
        const valid = yield* _(fixture("valid.json", duplicated))
        const result = yield* _(runCli(["node", "cli", valid, "--fail-on-duplicates", "--silent"]))
        expect(result.exitCode).toBe(2)
      })
    ).pipe(provideNodeContext))

  it.scoped("takes files and policy from an explicit config file", () =>
    withTempDir(({ fixture }) =>
      Effect.gen(function*(_) {
        const valid = yield* _(fixture("valid.json", duplicated))
        const config = yield* _(
          fixture("config.json", JSON.stringify({ files: [valid], failOnDuplicates: true }))
        )
        const result = yield* _(runCli(["node", "cli", "--config", config, "--silent"]))
        expect(result.exitCode).toBe(2)
        expect(result.report.stats).toEqual({ filesChecked: 1, invalidFiles: 0, duplicateKeys: 1 })
      })
    ).pipe(provideNodeContext))

  it.scoped("fails when an explicit config file is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "missing.json")
        const error = yield* _(Effect.flip(runCli(["node", "cli", "--config", missing, "--silent"])))
        expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${missing}` })
      })
    ).pipe(provideNodeContext))

  it.scoped("rejects a config file with wrongly typed fields", () =>
    withTempDir(({ fixture }) =>
      Effect.gen(function*(_) {
        const config = yield* _(fixture("config.json", `{"files": "a.json"}`))
        const error = yield* _(Effect.flip(runCli(["node", "cli", "--config", config, "--silent"])))
        expect(error._tag).toBe("ConfigError")
      })
    ).pipe(provideNodeContext))

  it.scoped("fails with a file error when an input file is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "nothing-here.json")
        const error = yield* _(Effect.flip(runCli(["node", "cli", missing, "--silent"])))
        expect(error._tag).toBe("FileError")
      })
    ).pipe(provideNodeContext))
})

describe("outline command", () => {
  it.scoped("exits with 0 for valid documents and 1 otherwise", () =>
    withTempDir(({ fixture }) =>
      Effect.gen(function*(_) {
        const valid = yield* _(fixture("valid.json", duplicated))
        const invalid = yield* _(fixture("invalid.json", broken))
        const ok = yield* _(runCli(["node", "cli", "outline", valid, "--silent"]))
        const bad = yield* _(runCli(["node", "cli", "outline", valid, invalid, "--silent"]))
        expect(ok.exitCode).toBe(0)
        expect(bad.exitCode).toBe(1)
        expect(bad.report.stats.invalidFiles).toBe(1)
      })
    ).pipe(provideNodeContext))
})
