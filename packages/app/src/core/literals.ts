import * as Either from "effect/Either"

import type { Cursor } from "./cursor.js"
import { advance } from "./cursor.js"
import { type InvalidJson, invalidJson } from "./errors.js"
import type { JsonBooleanNode, JsonNullNode, JsonNumberNode, JsonStringNode } from "./node.js"
import { booleanNode, nullNode, numberNode, stringNode } from "./node.js"

// CHANGE: scalar readers for strings, numbers and the true/false/null keywords
// WHY: leaves of the tree are decoded here, with escape and numeric grammar checks
// FORMAT THEOREM: ∀s: readString(s) = Right(v) → v contains no unresolved escape
// PURITY: CORE
// EFFECT: advances the cursor
// INVARIANT: strings stop ON the closing quote; numbers and keywords stop ON the delimiter
// COMPLEXITY: O(n) per literal

const simpleEscapes: ReadonlyMap<string, string> = new Map([
  ["\"", "\""],
  ["\\", "\\"],
  ["/", "/"],
  ["b", "\b"],
  ["f", "\f"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"]
])

const hexQuad = /^[0-9a-fA-F]{4}$/u
const numericGrammar = /^-?(?:[0-9]+(?:\.[0-9]+)?|\.[0-9]+)(?:[eE][-+]?[0-9]+)?$/u
const scalarDelimiters: ReadonlySet<string> = new Set([",", "}", "]"])

const readUnicodeEscape = (cursor: Cursor): Either.Either<string, InvalidJson> => {
  let digits = ""
  for (let count = 0; count < 4; count += 1) {
    advance(cursor)
    if (cursor.exhausted) {
      return Either.left(invalidJson(cursor.line))
    }
    digits += cursor.current
  }
  if (!hexQuad.test(digits)) {
    return Either.left(invalidJson(cursor.line))
  }
  return Either.right(String.fromCharCode(Number.parseInt(digits, 16)))
}

const readEscape = (cursor: Cursor): Either.Either<string, InvalidJson> => {
  advance(cursor)
  if (cursor.current === "u") {
    return readUnicodeEscape(cursor)
  }
  const decoded = simpleEscapes.get(cursor.current)
  if (decoded === undefined) {
    return Either.left(invalidJson(cursor.line))
  }
  return Either.right(decoded)
}

const readStringBody = (cursor: Cursor): Either.Either<string, InvalidJson> => {
  let value = ""
  while (true) {
    advance(cursor)
    if (cursor.exhausted) {
      return Either.left(invalidJson(cursor.line))
    }
    if (cursor.current === "\"") {
      return Either.right(value)
    }
    if (cursor.current === "\\") {
      const escaped = readEscape(cursor)
      if (Either.isLeft(escaped)) {
        return Either.left(escaped.left)
      }
      value += escaped.right
    } else {
      value += cursor.current
    }
  }
}

/**
 * Read a string literal whose opening quote is the current character.
 *
 * Spaces inside the literal are kept; the cursor is left on the closing quote.
 *
 * @pure false
 * @invariant cursor.skipSpace is true again on return
 * @complexity O(n)
 */
export const readStringLiteral = (cursor: Cursor): Either.Either<string, InvalidJson> => {
  cursor.skipSpace = false
  const result = readStringBody(cursor)
  cursor.skipSpace = true
  return result
}

export const readString = (cursor: Cursor): Either.Either<JsonStringNode, InvalidJson> => {
  const sourceLine = cursor.line
  return Either.map(readStringLiteral(cursor), (value) => stringNode(sourceLine, value))
}

// Collects up to the next delimiter or the end of input.
const collectUntilDelimiter = (cursor: Cursor): string => {
  let text = ""
  while (!cursor.exhausted && !scalarDelimiters.has(cursor.current)) {
    text += cursor.current
    advance(cursor)
  }
  return text.trim()
}

/**
 * Read a numeric literal.
 *
 * A failure is reported on the line the literal started on, i.e. the current
 * line moved back by the newlines consumed while scanning.
 *
 * @pure false
 * @invariant Right(n) → n.literal matches the numeric grammar
 * @complexity O(n)
 */
export const readNumber = (cursor: Cursor): Either.Either<JsonNumberNode, InvalidJson> => {
  const startLine = cursor.line
  const literal = collectUntilDelimiter(cursor)
  if (!numericGrammar.test(literal)) {
    const newlinesConsumed = cursor.line - startLine
    return Either.left(invalidJson(cursor.line - newlinesConsumed))
  }
  return Either.right(numberNode(startLine, literal))
}

export const readKeyword = (
  cursor: Cursor
): Either.Either<JsonBooleanNode | JsonNullNode, InvalidJson> => {
  const sourceLine = cursor.line
  const literal = collectUntilDelimiter(cursor)
  if (literal === "true" || literal === "false") {
    return Either.right(booleanNode(sourceLine, literal === "true"))
  }
  if (literal === "null") {
    return Either.right(nullNode(sourceLine))
  }
  return Either.left(invalidJson(cursor.line))
}
