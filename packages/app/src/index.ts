export { type ColonContext, expectValueAfterColon, legalStarters } from "./core/colon.js"
export { advance, type Cursor, makeCursor } from "./core/cursor.js"
export { collectDuplicates, type DuplicateKey, formatPath, type PathSegment } from "./core/duplicates.js"
export { type AppError, type InvalidJson, invalidJson } from "./core/errors.js"
export type { Json } from "./core/json.js"
export {
  childrenOf,
  type JsonArrayNode,
  type JsonBooleanNode,
  type JsonKind,
  type JsonNode,
  type JsonNullNode,
  type JsonNumberNode,
  type JsonObjectEntry,
  type JsonObjectNode,
  type JsonStringNode,
  type NumberRepresentation,
  toJson
} from "./core/node.js"
export { renderOutline } from "./core/outline.js"
export { parseBytes, parseDocument, parseText, readValue } from "./core/parse.js"
export { byteChunkReader, type CharReader, stringReader } from "./core/source.js"
export { decodeFile, readDocument } from "./shell/read-document.js"
