import type { FlatEntry, PathSegment, PropertyTree } from "../ports/tree"
import { EMPTY, leaf, recordOf, sequence } from "./tree"

/**
 * Lists every leaf of `tree` with its path.
 *
 * A sequence made only of leaves collapses into one entry holding all of
 * its values, the shape of a repeated flag. Other sequences put the element
 * index in the path. Empty nodes produce nothing.
 */
export function flatten<V>(tree: PropertyTree<V>): FlatEntry<V>[] {
  const out: FlatEntry<V>[] = []

  const go = (node: PropertyTree<V>, path: readonly PathSegment[]): void => {
    switch (node.kind) {
      case "empty":
        return
      case "leaf":
        out.push([path, [node.value]])
        return
      case "record":
        for (const [key, child] of node.fields) go(child, [...path, key])
        return
      case "sequence": {
        const values: V[] = []
        for (const item of node.items) {
          if (item.kind === "leaf") values.push(item.value)
        }

        if (values.length > 0 && values.length === node.items.length) {
          out.push([path, values])
          return
        }

        node.items.forEach((item, i) => go(item, [...path, i]))
      }
    }
  }

  go(tree, [])

  return out
}

/**
 * Rebuilds a tree from flattened entries. Entries sharing a key prefix meet
 * in one record; numeric segments build sequences, with `Empty` filling any
 * gap. Keyed children win over values stored at the same path.
 */
export function unflatten<V>(entries: readonly FlatEntry<V>[]): PropertyTree<V> {
  const values: V[] = []
  const children = new Map<PathSegment, FlatEntry<V>[]>()

  for (const [path, vs] of entries) {
    if (path.length === 0) {
      values.push(...vs)
      continue
    }

    const head = path[0]
    const group = children.get(head) ?? []
    group.push([path.slice(1), vs])
    children.set(head, group)
  }

  if (children.size > 0) {
    const heads = [...children.keys()]
    const indexes = heads.filter((h): h is number => typeof h === "number")

    if (indexes.length === heads.length) {
      const length = Math.max(...indexes) + 1

      return sequence(
        Array.from({ length }, (_, i) => {
          const group = children.get(i)
          return group ? unflatten(group) : EMPTY
        }),
      )
    }

    return recordOf([...children].map(([k, group]) => [String(k), unflatten(group)] as const))
  }

  if (values.length === 0) return EMPTY
  if (values.length === 1) return leaf(values[0])

  return sequence(values.map((v) => leaf(v)))
}

export type FlattenStringOptions = {
  /**
   * Joins path segments into one key.
   *
   * @default "."
   */
  keyDelimiter?: string

  /**
   * Joins the values of a multi-valued path.
   *
   * @default ","
   */
  valueDelimiter?: string
}

/**
 * Flattens a tree into a string map, e.g. for writing a properties or
 * dotenv file.
 */
export function flattenString(
  tree: PropertyTree<string>,
  opts: FlattenStringOptions = {},
): Record<string, string> {
  const keyDelimiter = opts.keyDelimiter ?? "."
  const valueDelimiter = opts.valueDelimiter ?? ","

  const out: Record<string, string> = {}

  for (const [path, values] of flatten(tree)) {
    out[path.map(String).join(keyDelimiter)] = values.join(valueDelimiter)
  }

  return out
}
