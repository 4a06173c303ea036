import type { Json } from "./json.js"

// CHANGE: model decoded values as one tagged union carrying source lines
// WHY: callers inspect both the value and the line on which it started
// FORMAT THEOREM: ∀n ∈ JsonNode: n.kind ∈ {Object, Array, String, Number, Boolean, Null}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object entries keep first-write-wins values; later keys only add lines
// COMPLEXITY: O(1)/O(1)

export type JsonKind = JsonNode["kind"]

export interface JsonObjectEntry {
  readonly value: JsonNode
  /** Line of the key's first occurrence. */
  readonly keyLine: number
  readonly duplicateLines: ReadonlyArray<number>
}

export interface JsonObjectNode {
  readonly kind: "Object"
  readonly sourceLine: number
  readonly entries: ReadonlyMap<string, JsonObjectEntry>
}

export interface JsonArrayNode {
  readonly kind: "Array"
  readonly sourceLine: number
  readonly items: ReadonlyArray<JsonNode>
}

export interface JsonStringNode {
  readonly kind: "String"
  readonly sourceLine: number
  readonly value: string
}

export type NumberRepresentation = "integer" | "decimal"

export interface JsonNumberNode {
  readonly kind: "Number"
  readonly sourceLine: number
  readonly representation: NumberRepresentation
  /** Decimals outside the double range become `Infinity`; `literal` keeps the text. */
  readonly value: number
  /** Trimmed source text of the literal. */
  readonly literal: string
}

export interface JsonBooleanNode {
  readonly kind: "Boolean"
  readonly sourceLine: number
  readonly value: boolean
}

export interface JsonNullNode {
  readonly kind: "Null"
  readonly sourceLine: number
}

export type JsonNode =
  | JsonObjectNode
  | JsonArrayNode
  | JsonStringNode
  | JsonNumberNode
  | JsonBooleanNode
  | JsonNullNode

const INT32_MIN = -2_147_483_648
const INT32_MAX = 2_147_483_647
const integralLiteral = /^-?[0-9]+$/u

/**
 * Classify a validated numeric literal.
 *
 * @param literal - Text already matched against the numeric grammar.
 * @returns Integer when integral and within int32, decimal otherwise.
 *
 * @pure true
 * @invariant integer values are never -0
 * @complexity O(n)
 */
export const numberNode = (sourceLine: number, literal: string): JsonNumberNode => {
  if (integralLiteral.test(literal)) {
    const parsed = Number.parseInt(literal, 10)
    if (parsed >= INT32_MIN && parsed <= INT32_MAX) {
      return { kind: "Number", sourceLine, representation: "integer", value: parsed === 0 ? 0 : parsed, literal }
    }
  }
  return { kind: "Number", sourceLine, representation: "decimal", value: Number(literal), literal }
}

export const stringNode = (sourceLine: number, value: string): JsonStringNode => ({
  kind: "String",
  sourceLine,
  value
})

export const booleanNode = (sourceLine: number, value: boolean): JsonBooleanNode => ({
  kind: "Boolean",
  sourceLine,
  value
})

export const nullNode = (sourceLine: number): JsonNullNode => ({ kind: "Null", sourceLine })

export const arrayNode = (sourceLine: number, items: ReadonlyArray<JsonNode>): JsonArrayNode => ({
  kind: "Array",
  sourceLine,
  items
})

export const objectNode = (
  sourceLine: number,
  entries: ReadonlyMap<string, JsonObjectEntry>
): JsonObjectNode => ({
  kind: "Object",
  sourceLine,
  entries
})

/**
 * Children in document order, paired with their key or index.
 *
 * @pure true
 * @complexity O(n)
 */
export const childrenOf = (
  node: JsonNode
): ReadonlyArray<{ readonly label: string | number; readonly node: JsonNode }> => {
  if (node.kind === "Object") {
    return [...node.entries].map(([key, entry]) => ({ label: key, node: entry.value }))
  }
  if (node.kind === "Array") {
    return node.items.map((item, index) => ({ label: index, node: item }))
  }
  return []
}

/**
 * Rebuild the plain JSON value of a tree, dropping line metadata.
 *
 * @pure true
 * @invariant key order follows first insertion
 * @complexity O(n) where n = node count
 */
export const toJson = (node: JsonNode): Json => {
  switch (node.kind) {
    case "Object":
      return Object.fromEntries([...node.entries].map(([key, entry]) => [key, toJson(entry.value)]))
    case "Array":
      return node.items.map((item) => toJson(item))
    case "String":
    case "Number":
    case "Boolean":
      return node.value
    case "Null":
      return null
  }
}
