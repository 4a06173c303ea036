import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: deterministic CLI parsing for json-tree-decoder
// WHY: keep argv decoding pure and testable at the boundary
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; non-flag arguments are input files
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "outline"

export interface CliArgs {
  readonly command: CliCommand
  readonly files: ReadonlyArray<string>
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
  readonly failOnDuplicates: boolean | undefined
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("outline", () => Either.right<CliCommand>("outline")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

export const defaultConfigPath = "./.json-tree-decoder.json"

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  files: [],
  configPath: defaultConfigPath,
  configPathExplicit: false,
  json: false,
  silent: false,
  verbose: false,
  failOnDuplicates: undefined
})

interface FlagStep {
  readonly next: CliArgs
  readonly consumed: number
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<FlagStep, CliError> =>
  Either.right({ next, consumed })

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): Either.Either<FlagStep, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

// The value is inline only (`--flag=false`): a following argument is a file.
const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<FlagStep, CliError> =>
  Either.map(parseBoolean(inlineValue ?? "true"), (value) => ({
    next: update(current, value),
    consumed: 1
  }))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const flagParsers: ReadonlyMap<string, FlagParser> = new Map<string, FlagParser>([
  ["json", (current) => setParsedFlag({ ...current, json: true }, 1)],
  ["silent", (current) => setParsedFlag({ ...current, silent: true }, 1)],
  ["verbose", (current) => setParsedFlag({ ...current, verbose: true }, 1)],
  [
    "fail-on-duplicates",
    (current, inlineValue) =>
      parseOptionalBooleanFlag(current, inlineValue, (args, value) => ({
        ...args,
        failOnDuplicates: value
      }))
  ],
  [
    "config",
    (current, inlineValue, nextValue) =>
      parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
        ...args,
        configPath: value,
        configPathExplicit: true
      }))
  ]
])

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers.get(name)
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const knownCommands: ReadonlySet<string> = new Set(["check", "outline"])

// A first argument that is neither a flag nor a known command is a file of `check`.
const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first) || !knownCommands.has(first)) {
    return Either.right({ command: "check", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseRest = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      args = { ...args, files: [...args.files, current] }
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to check when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return parseRest(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
}
