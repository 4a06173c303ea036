import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { renderOutline } from "../core/outline.js"
import { buildReport, exitCodeFor, formatFileResult, renderHumanReport, renderJsonReport, toFileResult } from "../core/report.js"
import type { Report } from "../core/types.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument } from "../shell/read-document.js"

// CHANGE: orchestrate the check and outline commands with functional core + imperative shell
// WHY: single entrypoint with typed errors and deterministic outputs
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once per file
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly report: Report
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emit = (cli: CliArgs, payload: string): Effect.Effect<void> => cli.silent ? Effect.void : writeStdout(payload)

const handleCheck = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const results = yield* _(
      Effect.forEach(config.files, (file) =>
        readDocument(file).pipe(Effect.map((decoded) => toFileResult(file, decoded))), { concurrency: 1 })
    )
    const report = buildReport(results)
    yield* _(emit(cli, cli.json ? renderJsonReport(report) : renderHumanReport(report)))
    return { report, exitCode: exitCodeFor(report, config.failOnDuplicates) }
  })

const handleOutline = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const results = yield* _(
      Effect.forEach(config.files, (file) =>
        Effect.gen(function*(_) {
          const decoded = yield* _(readDocument(file))
          const result = toFileResult(file, decoded)
          const body = Either.isRight(decoded) ? [renderOutline(decoded.right)] : []
          yield* _(emit(cli, [...formatFileResult(result), ...body].join("\n")))
          return result
        }), { concurrency: 1 })
    )
    const report = buildReport(results)
    return { report, exitCode: report.stats.invalidFiles > 0 ? 1 : 0 }
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => handleCheck(cli, config)),
    Match.when("outline", () => handleOutline(cli, config)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with report and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = Effect.gen(function*(_) {
      const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
      const config = yield* _(fromEither(resolveConfig(cli, fileConfig)))
      return yield* _(executeCommand(cli, config))
    })
    return yield* _(
      program.pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })
