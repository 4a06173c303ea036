import * as Either from "effect/Either"

import type { CliArgs } from "./cli.js"
import type { ConfigError } from "./errors.js"
import { configError } from "./errors.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved files list is non-empty and duplicate-free
// COMPLEXITY: O(n)/O(1)

export interface FileConfig {
  readonly files?: ReadonlyArray<string>
  readonly failOnDuplicates?: boolean
}

export interface ResolvedConfig {
  readonly files: ReadonlyArray<string>
  readonly failOnDuplicates: boolean
}

const unique = (values: ReadonlyArray<string>): ReadonlyArray<string> => [...new Set(values)]

const resolveFiles = (cli: CliArgs, fileConfig: FileConfig | undefined): ReadonlyArray<string> =>
  unique(cli.files.length > 0 ? cli.files : fileConfig?.files ?? [])

const resolveFailOnDuplicates = (cli: CliArgs, fileConfig: FileConfig | undefined): boolean =>
  cli.failOnDuplicates ?? fileConfig?.failOnDuplicates ?? false

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-tree-decoder.json.
 * @returns Resolved configuration, or ConfigError when no input file remains.
 *
 * @pure true
 * @invariant files length ≥ 1
 * @complexity O(n)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): Either.Either<ResolvedConfig, ConfigError> => {
  const files = resolveFiles(cli, fileConfig)
  if (files.length === 0) {
    return Either.left(configError("No input files: pass paths or set \"files\" in the config file"))
  }
  return Either.right({
    files,
    failOnDuplicates: resolveFailOnDuplicates(cli, fileConfig)
  })
}
