import type { CharReader } from "./source.js"

// CHANGE: explicit cursor state threaded through the recursive descent
// WHY: one owner for the current character, end-of-input flag and line counter
// FORMAT THEOREM: ∀c: advance(c) → c.exhausted ∨ c.current ∉ Skipped(c.skipSpace)
// PURITY: CORE
// EFFECT: mutates the cursor it is given
// INVARIANT: line = 1 + count of "\n" consumed from the reader
// COMPLEXITY: O(k) per advance where k = skipped characters

export interface Cursor {
  readonly reader: CharReader
  /** Current character; the empty string once the input is exhausted. */
  current: string
  exhausted: boolean
  line: number
  /** Disabled only while the body of a string literal is read. */
  skipSpace: boolean
}

const alwaysSkipped: ReadonlySet<string> = new Set(["\r", "\n", "\t"])

const readChar = (cursor: Cursor): void => {
  const next = cursor.reader.read()
  if (next === undefined) {
    cursor.exhausted = true
    cursor.current = ""
    return
  }
  cursor.exhausted = false
  cursor.current = next
  if (next === "\n") {
    cursor.line += 1
  }
}

const isSkipped = (cursor: Cursor): boolean =>
  alwaysSkipped.has(cursor.current) || (cursor.skipSpace && cursor.current === " ")

/**
 * Move to the next meaningful character.
 *
 * @pure false
 * @invariant on return the cursor is exhausted or sits on a non-skipped character
 * @complexity O(k)
 */
export const advance = (cursor: Cursor): void => {
  readChar(cursor)
  while (!cursor.exhausted && isSkipped(cursor)) {
    readChar(cursor)
  }
}

/**
 * Create a cursor primed with the first meaningful character of the input.
 *
 * @pure false
 * @complexity O(k)
 */
export const makeCursor = (reader: CharReader): Cursor => {
  const cursor: Cursor = {
    reader,
    current: "",
    exhausted: true,
    line: 1,
    skipSpace: true
  }
  advance(cursor)
  return cursor
}
