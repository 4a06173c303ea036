import type { JsonNode } from "./node.js"

// CHANGE: render a decoded tree as an indented outline of kinds and lines
// WHY: shows where each value starts without producing JSON text
// FORMAT THEOREM: ∀n: lines(renderOutline(n)) = count(nodes(n))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: children are indented two spaces deeper than their parent
// COMPLEXITY: O(n)

const summarize = (node: JsonNode): string => {
  switch (node.kind) {
    case "Object":
      return `Object{${node.entries.size}}`
    case "Array":
      return `Array[${node.items.length}]`
    case "String":
      return `String ${JSON.stringify(node.value)}`
    case "Number":
      return `Number ${node.representation} ${node.literal}`
    case "Boolean":
      return `Boolean ${String(node.value)}`
    case "Null":
      return "Null"
  }
}

const render = (node: JsonNode, prefix: string, depth: number, out: Array<string>): void => {
  out.push(`${"  ".repeat(depth)}${prefix}${summarize(node)} @${node.sourceLine}`)
  if (node.kind === "Object") {
    for (const [key, entry] of node.entries) {
      const duplicates = entry.duplicateLines.length === 0
        ? ""
        : ` (duplicate at ${entry.duplicateLines.join(", ")})`
      render(entry.value, `${JSON.stringify(key)}${duplicates}: `, depth + 1, out)
    }
  }
  if (node.kind === "Array") {
    node.items.forEach((item, index) => {
      render(item, `[${index}]: `, depth + 1, out)
    })
  }
}

/**
 * Render one line per node: indentation, key or index, kind summary, start line.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderOutline = (root: JsonNode): string => {
  const out: Array<string> = []
  render(root, "", 0, out)
  return out.join("\n")
}
