import * as Either from "effect/Either"

import type { Cursor } from "./cursor.js"
import { advance } from "./cursor.js"
import { type InvalidJson, invalidJson } from "./errors.js"

// CHANGE: validate the colon after a key and the character that follows it
// WHY: only a fixed set of characters may begin a value after a colon
// FORMAT THEOREM: ∀c,ctx: expect(c, ctx) = Right → c.current ∈ starters(ctx)
// PURITY: CORE
// EFFECT: advances the cursor twice
// INVARIANT: starters("detached") ⊂ starters("object")
// COMPLEXITY: O(1)

export type ColonContext = "object" | "detached"

const digits = ["0", "1", "2", "3", "4", "5", "6", "7", "8", "9"] as const

const objectStarters: ReadonlySet<string> = new Set(["\"", "{", "[", ...digits, "t", "f", "n"])

const detachedStarters: ReadonlySet<string> = new Set(["\"", "{", "["])

export const legalStarters = (context: ColonContext): ReadonlySet<string> =>
  context === "object" ? objectStarters : detachedStarters

/**
 * Consume `:` after a key and check the first character of the value.
 *
 * The object builder always passes "object"; "detached" is the narrower set
 * for a key/value pair that is not nested in an object.
 *
 * @param cursor - Cursor sitting on the closing quote of the key.
 * @param context - Container context of the pair.
 * @returns Right when the cursor now sits on a legal value starter.
 *
 * @pure false
 * @complexity O(1)
 */
export const expectValueAfterColon = (
  cursor: Cursor,
  context: ColonContext
): Either.Either<void, InvalidJson> => {
  advance(cursor)
  if (cursor.current !== ":") {
    return Either.left(invalidJson(cursor.line))
  }
  advance(cursor)
  if (!legalStarters(context).has(cursor.current)) {
    return Either.left(invalidJson(cursor.line))
  }
  return Either.right(undefined)
}
