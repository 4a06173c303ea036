import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Chunk, Effect, Stream } from "effect"
import * as Either from "effect/Either"

import type { AppError, InvalidJson } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { JsonNode } from "../core/node.js"
import { parseBytes } from "../core/parse.js"

// CHANGE: stream a file's bytes into the decoder
// WHY: documents arrive as files; IO failures and grammar failures stay distinct
// FORMAT THEOREM: ∀p: read(p) = Right(Left(e)) → e.line ≥ 1
// PURITY: SHELL
// EFFECT: Effect<Either<JsonNode, InvalidJson>, AppError, FileSystem>
// INVARIANT: IO errors fail the effect; grammar errors are returned as values
// COMPLEXITY: O(n)

export const readDocument = (
  path: string
): Effect.Effect<Either.Either<JsonNode, InvalidJson>, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const chunks = yield* _(
      fs.stream(path).pipe(
        Stream.runCollect,
        Effect.mapError((error) => fileError(String(error)))
      )
    )
    const decoded = parseBytes(Chunk.toReadonlyArray(chunks))
    yield* _(
      Either.match(decoded, {
        onLeft: (error) => Effect.logDebug(`rejected at line ${error.line}`),
        onRight: (root) => Effect.logDebug(`decoded ${root.kind} root`)
      }).pipe(Effect.annotateLogs("file", path))
    )
    return decoded
  })

/**
 * Read a document and fail the effect on a grammar violation.
 *
 * @pure false
 * @effect FileSystem
 * @complexity O(n)
 */
export const decodeFile = (
  path: string
): Effect.Effect<JsonNode, AppError, FileSystemService> =>
  Effect.flatMap(readDocument(path), (decoded) =>
    Either.isLeft(decoded) ? Effect.fail(decoded.left) : Effect.succeed(decoded.right))
