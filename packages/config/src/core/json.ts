import type { JsonValue, PropertyTree } from "../ports/tree"
import { EMPTY, leaf, recordOf, sequence } from "./tree"

export function toJson(tree: PropertyTree<string>): JsonValue {
  switch (tree.kind) {
    case "leaf":
      return tree.value
    case "empty":
      return null
    case "record":
      return Object.fromEntries([...tree.fields].map(([k, v]) => [k, toJson(v)]))
    case "sequence":
      return tree.items.map(toJson)
  }
}

/**
 * Converts parsed JSON (or any plain object) into a tree. Scalars become
 * string leaves; `null` and `undefined` become `Empty`.
 */
export function fromJsonValue(json: unknown): PropertyTree<string> {
  if (json === null || json === undefined) return EMPTY

  if (Array.isArray(json)) return sequence(json.map(fromJsonValue))

  switch (typeof json) {
    case "string":
      return leaf(json)
    case "number":
    case "boolean":
    case "bigint":
      return leaf(String(json))
    case "object":
      return recordOf(Object.entries(json).map(([k, v]) => [k, fromJsonValue(v)] as const))
    default:
      return EMPTY
  }
}
