/**
 * One step of a path into a {@link PropertyTree}: a record key, or the
 * position of an element inside a sequence.
 */
export type PathSegment = string | number

export type LeafNode<V> = {
  readonly kind: "leaf"
  readonly value: V
}

export type RecordNode<V> = {
  readonly kind: "record"
  readonly fields: ReadonlyMap<string, PropertyTree<V>>
}

export type SequenceNode<V> = {
  readonly kind: "sequence"
  readonly items: readonly PropertyTree<V>[]
}

export type EmptyNode = {
  readonly kind: "empty"
}

/**
 * Hierarchical configuration data, independent of where it was read from.
 *
 * Every adapter (env, dotenv, JSON, argv) produces one of these and every
 * descriptor is read from and written to one. Trees are frozen on
 * construction and never mutated.
 *
 * @typeParam V - Leaf value type, `string` for everything read from a source.
 */
export type PropertyTree<V = string> = LeafNode<V> | RecordNode<V> | SequenceNode<V> | EmptyNode

/**
 * A flattened tree entry: the path from the root and the leaf values found there.
 */
export type FlatEntry<V = string> = readonly [path: readonly PathSegment[], values: readonly V[]]

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue }
