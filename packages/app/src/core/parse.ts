import * as Either from "effect/Either"

import { expectValueAfterColon } from "./colon.js"
import type { Cursor } from "./cursor.js"
import { advance, makeCursor } from "./cursor.js"
import { type InvalidJson, invalidJson } from "./errors.js"
import { readKeyword, readNumber, readString, readStringLiteral } from "./literals.js"
import type { JsonArrayNode, JsonNode, JsonObjectNode } from "./node.js"
import { arrayNode, objectNode } from "./node.js"
import type { CharReader } from "./source.js"
import { byteChunkReader, stringReader } from "./source.js"

// CHANGE: recursive-descent decoder building a line-annotated JsonNode tree
// WHY: whole-document decoding with the first violation reported by line
// FORMAT THEOREM: ∀t: parseText(t) = Right(n) → toJson(n) ≡ JSON.parse(t) for duplicate-free t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first violation aborts the parse; no partial tree is returned
// COMPLEXITY: O(n) where n = input length; recursion depth = nesting depth

interface MutableEntry {
  readonly value: JsonNode
  readonly keyLine: number
  readonly duplicateLines: Array<number>
}

// Strings and containers leave the cursor on their own closing character.
const stopsOnCloser = (node: JsonNode): boolean =>
  node.kind === "Object" || node.kind === "Array" || node.kind === "String"

const readObject = (cursor: Cursor): Either.Either<JsonObjectNode, InvalidJson> => {
  const sourceLine = cursor.line
  const entries = new Map<string, MutableEntry>()
  advance(cursor)
  if (cursor.current === "}") {
    return Either.right(objectNode(sourceLine, entries))
  }
  while (true) {
    if (cursor.current !== "\"") {
      return Either.left(invalidJson(cursor.line))
    }
    const keyLine = cursor.line
    const key = readStringLiteral(cursor)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const colon = expectValueAfterColon(cursor, "object")
    if (Either.isLeft(colon)) {
      return Either.left(colon.left)
    }
    const value = readValue(cursor)
    if (Either.isLeft(value)) {
      return Either.left(value.left)
    }
    const existing = entries.get(key.right)
    if (existing === undefined) {
      entries.set(key.right, { value: value.right, keyLine, duplicateLines: [] })
    } else {
      existing.duplicateLines.push(keyLine)
    }
    if (stopsOnCloser(value.right)) {
      advance(cursor)
    }
    if (cursor.current === "}") {
      return Either.right(objectNode(sourceLine, entries))
    }
    if (cursor.current !== ",") {
      return Either.left(invalidJson(cursor.line))
    }
    advance(cursor)
  }
}

const readArray = (cursor: Cursor): Either.Either<JsonArrayNode, InvalidJson> => {
  const sourceLine = cursor.line
  const items: Array<JsonNode> = []
  advance(cursor)
  if (cursor.current === "]") {
    return Either.right(arrayNode(sourceLine, items))
  }
  while (true) {
    const item = readValue(cursor)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right)
    if (stopsOnCloser(item.right)) {
      advance(cursor)
    }
    if (cursor.current !== ",") {
      break
    }
    advance(cursor)
  }
  if (cursor.current !== "]") {
    return Either.left(invalidJson(cursor.line))
  }
  return Either.right(arrayNode(sourceLine, items))
}

/**
 * Dispatch on the current character to the matching production.
 *
 * Numbers are the fallback branch: an unknown starter is read as a number and
 * rejected by the numeric grammar.
 *
 * @param cursor - Cursor positioned on the first character of a value.
 * @returns The decoded node or the first violation.
 *
 * @pure false
 * @invariant Left when the cursor is exhausted on entry
 * @complexity O(n)
 */
export const readValue = (cursor: Cursor): Either.Either<JsonNode, InvalidJson> => {
  if (cursor.exhausted) {
    return Either.left(invalidJson(cursor.line))
  }
  switch (cursor.current) {
    case "{":
      return readObject(cursor)
    case "[":
      return readArray(cursor)
    case "\"":
      return readString(cursor)
    case "t":
    case "f":
    case "n":
      return readKeyword(cursor)
    default:
      return readNumber(cursor)
  }
}

/**
 * Decode a whole document from a character reader.
 *
 * @param reader - Forward-only source of characters.
 * @returns Root node of any kind, or InvalidJson with a 1-based line.
 *
 * @pure false
 * @invariant only skipped whitespace may follow the root value
 * @complexity O(n)
 */
export const parseDocument = (reader: CharReader): Either.Either<JsonNode, InvalidJson> => {
  const cursor = makeCursor(reader)
  const root = readValue(cursor)
  if (Either.isLeft(root)) {
    return Either.left(root.left)
  }
  if (stopsOnCloser(root.right)) {
    advance(cursor)
  }
  if (!cursor.exhausted) {
    return Either.left(invalidJson(cursor.line))
  }
  return Either.right(root.right)
}

/**
 * Decode a document held in memory as text.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseText = (text: string): Either.Either<JsonNode, InvalidJson> =>
  parseDocument(stringReader(text))

/**
 * Decode UTF-8 bytes, given as one or more chunks.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseBytes = (
  chunks: Iterable<Uint8Array>
): Either.Either<JsonNode, InvalidJson> => parseDocument(byteChunkReader(chunks))
