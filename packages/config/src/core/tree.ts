import type {
  EmptyNode,
  LeafNode,
  PropertyTree,
  RecordNode,
  SequenceNode,
} from "../ports/tree"

const emptyNode: EmptyNode = { kind: "empty" }

export const EMPTY = Object.freeze(emptyNode)

export function leaf<V>(value: V): LeafNode<V> {
  const node: LeafNode<V> = { kind: "leaf", value }
  return Object.freeze(node)
}

export function record<V>(fields: Readonly<Record<string, PropertyTree<V>>>): RecordNode<V> {
  return recordOf(Object.entries(fields))
}

export function recordOf<V>(
  entries: Iterable<readonly [string, PropertyTree<V>]>,
): RecordNode<V> {
  const node: RecordNode<V> = { kind: "record", fields: new Map(entries) }
  return Object.freeze(node)
}

export function sequence<V>(items: readonly PropertyTree<V>[]): SequenceNode<V> {
  const node: SequenceNode<V> = { kind: "sequence", items: Object.freeze([...items]) }
  return Object.freeze(node)
}

/**
 * A tree is empty when it holds no leaf at any depth. `Empty`, a
 * zero-length sequence and a record of empty fields all qualify.
 */
export function isEmpty<V>(tree: PropertyTree<V>): boolean {
  switch (tree.kind) {
    case "leaf":
      return false
    case "empty":
      return true
    case "record":
      return [...tree.fields.values()].every(isEmpty)
    case "sequence":
      return tree.items.every(isEmpty)
  }
}

export function mapTree<A, B>(tree: PropertyTree<A>, f: (value: A) => B): PropertyTree<B> {
  switch (tree.kind) {
    case "leaf":
      return leaf(f(tree.value))
    case "empty":
      return EMPTY
    case "record":
      return recordOf([...tree.fields].map(([k, v]) => [k, mapTree(v, f)] as const))
    case "sequence":
      return sequence(tree.items.map((item) => mapTree(item, f)))
  }
}

/**
 * Combines the leaves found at the same position in both trees.
 *
 * A position present on one side only pairs with `Empty`, which yields
 * `Empty`; so does any shape mismatch such as a leaf against a record.
 */
export function zipWith<A, B, C>(
  left: PropertyTree<A>,
  right: PropertyTree<B>,
  f: (a: A, b: B) => C,
): PropertyTree<C> {
  if (left.kind === "leaf" && right.kind === "leaf") {
    return leaf(f(left.value, right.value))
  }

  if (left.kind === "record" && right.kind === "record") {
    const keys = new Set([...left.fields.keys(), ...right.fields.keys()])

    return recordOf(
      [...keys].map(
        (k) => [k, zipWith(left.fields.get(k) ?? EMPTY, right.fields.get(k) ?? EMPTY, f)] as const,
      ),
    )
  }

  if (left.kind === "sequence" && right.kind === "sequence") {
    const length = Math.max(left.items.length, right.items.length)

    return sequence(
      Array.from({ length }, (_, i) =>
        zipWith(left.items[i] ?? EMPTY, right.items[i] ?? EMPTY, f),
      ),
    )
  }

  return EMPTY
}

const CANONICAL_INDEX = /^(0|[1-9]\d*)$/

/**
 * Walks `path` from the root.
 *
 * Under a sequence, a numeric key selects one element; any other key is
 * looked up in every element and the non-empty answers form a new sequence.
 */
export function getPath<V>(tree: PropertyTree<V>, path: readonly string[]): PropertyTree<V> {
  let current = tree

  for (const [i, key] of path.entries()) {
    switch (current.kind) {
      case "leaf":
      case "empty":
        return EMPTY
      case "record":
        current = current.fields.get(key) ?? EMPTY
        break
      case "sequence": {
        if (CANONICAL_INDEX.test(key)) {
          current = current.items[Number(key)] ?? EMPTY
          break
        }

        const rest = path.slice(i)
        const found = current.items
          .map((item) => getPath(item, rest))
          .filter((item) => !isEmpty(item))

        return found.length ? sequence(found) : EMPTY
      }
    }
  }

  return current
}

/**
 * Builds a single-branch tree holding `tree` under `path`.
 */
export function fromPath<V>(path: readonly string[], tree: PropertyTree<V>): PropertyTree<V> {
  return path.reduceRight<PropertyTree<V>>((acc, key) => recordOf([[key, acc]]), tree)
}
