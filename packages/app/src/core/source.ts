// CHANGE: forward-only character sources for the cursor
// WHY: the decoder accepts raw text as well as UTF-8 byte chunks read from a stream
// FORMAT THEOREM: ∀s: drain(stringReader(s)) = s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: read() never yields a character twice; undefined is sticky once returned
// COMPLEXITY: O(1) amortized per read

export interface CharReader {
  /** Next UTF-16 code unit, or undefined when the input is exhausted. */
  readonly read: () => string | undefined
}

export const stringReader = (text: string): CharReader => {
  let index = 0
  return {
    read: () => {
      if (index >= text.length) {
        return undefined
      }
      const char = text.charAt(index)
      index += 1
      return char
    }
  }
}

/**
 * Decode UTF-8 chunks lazily, one chunk at a time.
 *
 * A multi-byte sequence split across two chunks is joined by the streaming
 * decoder; a leading byte-order mark is dropped.
 *
 * @pure false
 * @invariant each chunk is pulled from the iterator at most once
 * @complexity O(n) over all chunks
 */
export const byteChunkReader = (chunks: Iterable<Uint8Array>): CharReader => {
  const decoder = new TextDecoder("utf-8")
  const iterator = chunks[Symbol.iterator]()
  let buffer = ""
  let index = 0
  let finished = false

  const refill = (): boolean => {
    while (!finished) {
      const next = iterator.next()
      if (next.done === true) {
        finished = true
        buffer = decoder.decode()
        index = 0
        return buffer.length > 0
      }
      buffer = decoder.decode(next.value, { stream: true })
      index = 0
      if (buffer.length > 0) {
        return true
      }
    }
    return false
  }

  return {
    read: () => {
      if (index >= buffer.length && !refill()) {
        return undefined
      }
      const char = buffer.charAt(index)
      index += 1
      return char
    }
  }
}
