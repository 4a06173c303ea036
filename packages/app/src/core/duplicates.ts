import type { JsonNode } from "./node.js"
import { childrenOf } from "./node.js"

// CHANGE: list duplicated object keys found anywhere in a decoded tree
// WHY: duplicate keys are recorded during decoding, not reported as failures
// FORMAT THEOREM: ∀d ∈ collectDuplicates(n): d.duplicateLines ≠ ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: results follow document order (pre-order, keys in insertion order)
// COMPLEXITY: O(n) where n = node count

export type PathSegment = string | number

export interface DuplicateKey {
  /** Path of the object that holds the key. */
  readonly path: ReadonlyArray<PathSegment>
  readonly key: string
  readonly firstLine: number
  readonly duplicateLines: ReadonlyArray<number>
}

const identifier = /^[A-Za-z_$][A-Za-z0-9_$]*$/u

/**
 * Render a path as `$`, `$.a[0]`, `$["spaced key"]`.
 *
 * @pure true
 * @complexity O(n)
 */
export const formatPath = (path: ReadonlyArray<PathSegment>): string =>
  path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`
    }
    return identifier.test(segment) ? `${acc}.${segment}` : `${acc}[${JSON.stringify(segment)}]`
  }, "$")

const visit = (
  node: JsonNode,
  path: ReadonlyArray<PathSegment>,
  found: Array<DuplicateKey>
): void => {
  if (node.kind === "Object") {
    for (const [key, entry] of node.entries) {
      if (entry.duplicateLines.length > 0) {
        found.push({ path, key, firstLine: entry.keyLine, duplicateLines: entry.duplicateLines })
      }
    }
  }
  for (const child of childrenOf(node)) {
    visit(child.node, [...path, child.label], found)
  }
}

/**
 * Collect every key that occurred more than once in its object.
 *
 * @param root - Decoded tree.
 * @returns Duplicate keys in document order.
 *
 * @pure true
 * @complexity O(n)
 */
export const collectDuplicates = (root: JsonNode): ReadonlyArray<DuplicateKey> => {
  const found: Array<DuplicateKey> = []
  visit(root, [], found)
  return found
}
