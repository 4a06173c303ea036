import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { expectValueAfterColon, legalStarters } from "../../src/core/colon.js"
import { makeCursor } from "../../src/core/cursor.js"
import { stringReader } from "../../src/core/source.js"

// Each cursor starts on "x", standing in for the closing quote of a key.
const cursorOn = (text: string) => makeCursor(stringReader(text))

describe("expectValueAfterColon", () => {
  it.effect("leaves the cursor on the value starter", () =>
    Effect.sync(() => {
      const cursor = cursorOn("x : 1")
      expect(Either.isRight(expectValueAfterColon(cursor, "object"))).toBe(true)
      expect(cursor.current).toBe("1")
    }))

  it.effect("requires a colon", () =>
    Effect.sync(() => {
      const result = expectValueAfterColon(cursorOn("x 1"), "object")
      expect(Either.isLeft(result) && result.left.line).toBe(1)
    }))

  it.effect("accepts every value starter inside an object", () =>
    Effect.sync(() => {
      for (const starter of ["\"", "{", "[", "0", "7", "t", "f", "n"]) {
        expect(Either.isRight(expectValueAfterColon(cursorOn(`x:${starter}`), "object"))).toBe(true)
      }
    }))

  it.effect("rejects a minus sign after the colon", () =>
    Effect.sync(() => {
      const result = expectValueAfterColon(cursorOn("x: -1"), "object")
      expect(Either.isLeft(result) && result.left.line).toBe(1)
      expect(legalStarters("object").has("-")).toBe(false)
    }))

  it.effect("accepts only quotes, braces and brackets outside an object", () =>
    Effect.sync(() => {
      expect(Either.isRight(expectValueAfterColon(cursorOn("x:\"a\""), "detached"))).toBe(true)
      expect(Either.isRight(expectValueAfterColon(cursorOn("x:["), "detached"))).toBe(true)
      expect(Either.isLeft(expectValueAfterColon(cursorOn("x:1"), "detached"))).toBe(true)
      expect(Either.isLeft(expectValueAfterColon(cursorOn("x:true"), "detached"))).toBe(true)
      expect([...legalStarters("detached")]).toEqual(["\"", "{", "["])
    }))

  it.effect("reports the line of the illegal starter", () =>
    Effect.sync(() => {
      const result = expectValueAfterColon(cursorOn("x:\n\n}"), "object")
      expect(Either.isLeft(result) && result.left.line).toBe(3)
    }))

  it.effect("fails when the input ends after the colon", () =>
    Effect.sync(() => {
      expect(Either.isLeft(expectValueAfterColon(cursorOn("x:"), "object"))).toBe(true)
    }))
})
