import type { PropertyTree } from "../ports/tree"
import { EMPTY, isEmpty, recordOf, sequence } from "./tree"

/**
 * Merges two trees, returning every alternative the combination allows,
 * preferred first.
 *
 * - an empty side gives way to the other
 * - sequences are appended, not merged by position
 * - records merge key by key
 * - anything else keeps both trees as alternatives
 */
export function merge<V>(left: PropertyTree<V>, right: PropertyTree<V>): PropertyTree<V>[] {
  if (isEmpty(right)) return [left]
  if (isEmpty(left)) return [right]

  if (left.kind === "sequence" && right.kind === "sequence") {
    return [sequence([...left.items, ...right.items])]
  }

  if (left.kind === "record" && right.kind === "record") {
    const keys = new Set([...left.fields.keys(), ...right.fields.keys()])

    let combos: [string, PropertyTree<V>][][] = [[]]

    for (const key of keys) {
      const l = left.fields.get(key)
      const r = right.fields.get(key)
      const options = l && r ? merge(l, r) : [l ?? r ?? EMPTY]

      combos = combos.flatMap((combo) =>
        options.map((option): [string, PropertyTree<V>][] => [...combo, [key, option]]),
      )
    }

    return combos.map((entries) => recordOf(entries))
  }

  return [left, right]
}

/**
 * Folds `merge` over `trees` from left to right.
 */
export function mergeAll<V>(trees: readonly PropertyTree<V>[]): PropertyTree<V>[] {
  return trees.reduce<PropertyTree<V>[]>(
    (acc, tree) => acc.flatMap((alternative) => merge(alternative, tree)),
    [EMPTY],
  )
}

/**
 * Removes empty record fields and sequence elements at every depth. A node
 * left with nothing in it becomes `Empty`.
 */
export function dropEmpty<V>(tree: PropertyTree<V>): PropertyTree<V> {
  switch (tree.kind) {
    case "leaf":
    case "empty":
      return tree
    case "record": {
      const fields = [...tree.fields]
        .map(([k, v]) => [k, dropEmpty(v)] as const)
        .filter(([, v]) => v.kind !== "empty")

      return fields.length ? recordOf(fields) : EMPTY
    }
    case "sequence": {
      const items = tree.items.map(dropEmpty).filter((item) => item.kind !== "empty")

      return items.length ? sequence(items) : EMPTY
    }
  }
}

/**
 * Replaces every one-element sequence by its element, at every depth.
 */
export function unwrapSingletonLists<V>(tree: PropertyTree<V>): PropertyTree<V> {
  switch (tree.kind) {
    case "leaf":
    case "empty":
      return tree
    case "record":
      return recordOf([...tree.fields].map(([k, v]) => [k, unwrapSingletonLists(v)] as const))
    case "sequence": {
      const [only] = tree.items
      if (tree.items.length === 1 && only) return unwrapSingletonLists(only)

      return sequence(tree.items.map(unwrapSingletonLists))
    }
  }
}
