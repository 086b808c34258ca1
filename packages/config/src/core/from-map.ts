import { type ConfigSource, LeafForSequence } from "../ports/source"
import type { PropertyTree } from "../ports/tree"
import { dropEmpty, mergeAll, unwrapSingletonLists } from "./merge"
import { fromTrees } from "./source"
import { fromPath, leaf, sequence } from "./tree"

export type FromMultiMapOptions = {
  /**
   * Source name used for provenance.
   *
   * @default "constant"
   */
  source?: string

  /**
   * Splits keys into nested paths, e.g. `"_"` turns `KAFKA_SERVERS` into
   * `KAFKA` → `SERVERS`. Blank segments are dropped.
   */
  keyDelimiter?: string

  /**
   * @default LeafForSequence.Valid
   */
  leafForSequence?: LeafForSequence

  /**
   * Keeps only the keys for which this returns `true`.
   */
  filterKeys?: (key: string) => boolean
}

export type FromMapOptions = FromMultiMapOptions & {
  /**
   * Splits every value into a list; the parts are trimmed.
   */
  valueDelimiter?: string
}

/**
 * Builds the trees for a flat key to values map: one single-branch tree per
 * key, merged, stripped of empty nodes, with one-element lists unwrapped.
 */
export function multiMapToTrees(
  map: Readonly<Record<string, readonly string[]>>,
  opts: Pick<FromMultiMapOptions, "keyDelimiter" | "filterKeys"> = {},
): PropertyTree<string>[] {
  const { keyDelimiter, filterKeys = () => true } = opts

  const trees = Object.entries(map)
    .filter(([key]) => filterKeys(key))
    .map(([key, values]) => {
      const path = keyDelimiter
        ? key.split(keyDelimiter).filter((segment) => segment.trim().length > 0)
        : [key]

      return fromPath(path, sequence(values.map((v) => leaf(v))))
    })

  return mergeAll(trees).map((tree) => unwrapSingletonLists(dropEmpty(tree)))
}

export function mapToTrees(
  map: Readonly<Record<string, string>>,
  opts: Pick<FromMapOptions, "keyDelimiter" | "valueDelimiter" | "filterKeys"> = {},
): PropertyTree<string>[] {
  const { valueDelimiter } = opts

  const multi = Object.fromEntries(
    Object.entries(map).map(([key, value]) => [
      key,
      valueDelimiter ? value.split(valueDelimiter).map((v) => v.trim()) : [value],
    ]),
  )

  return multiMapToTrees(multi, opts)
}

/**
 * A source over a flat string map.
 *
 * @example
 * ```typescript
 * const source = fromMap(
 *   { KAFKA_SERVERS: "server1, server2", KAFKA_SERDE: "confluent" },
 *   { keyDelimiter: "_", valueDelimiter: "," },
 * )
 *
 * source.getValue(["KAFKA", "SERVERS"]) // Sequence[Leaf("server1"), Leaf("server2")]
 * ```
 */
export function fromMap(
  map: Readonly<Record<string, string>>,
  opts: FromMapOptions = {},
): ConfigSource {
  return fromTrees(
    mapToTrees(map, opts),
    opts.source ?? "constant",
    opts.leafForSequence ?? LeafForSequence.Valid,
  )
}

export function fromMultiMap(
  map: Readonly<Record<string, readonly string[]>>,
  opts: FromMultiMapOptions = {},
): ConfigSource {
  return fromTrees(
    multiMapToTrees(map, opts),
    opts.source ?? "constant",
    opts.leafForSequence ?? LeafForSequence.Valid,
  )
}
