import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the decoder and its CLI
// WHY: every grammar violation and every CLI failure needs a typed, matchable shape
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: InvalidJson.line ≥ 1
// COMPLEXITY: O(1)/O(1)

export type InvalidJson = {
  readonly _tag: "InvalidJson"
  readonly line: number
  readonly message: string
}
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | InvalidJson

/**
 * Build the single grammar-violation error.
 *
 * @param line - 1-based line at which the violation was detected.
 *
 * @pure true
 * @complexity O(1)
 */
export const invalidJson = (line: number): InvalidJson => ({
  _tag: "InvalidJson",
  line,
  message: `Invalid JSON at line ${line}`
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})
