import type { PropertyTree } from "./tree"

/**
 * Whether a single leaf may stand for a one-element list.
 *
 * Flat sources (one env var, one flag) cannot tell `"a"` from `["a"]`, so
 * they are `Valid`. Structured documents can, and may use `Invalid`.
 */
export const LeafForSequence = {
  Valid: "valid",
  Invalid: "invalid",
} as const

export type LeafForSequence = (typeof LeafForSequence)[keyof typeof LeafForSequence]

/**
 * The answer of a source for one path, along with the names and sequence
 * policy of the source that gave it.
 */
export type Resolution = {
  readonly tree: PropertyTree<string>
  readonly names: readonly string[]
  readonly leafForSequence: LeafForSequence
  /** A source over part of `tree`, keeping the key mapping of the source that answered */
  readonly within: (tree: PropertyTree<string>) => ConfigSource
}

/**
 * A named, composable path to tree lookup.
 *
 * Lookups are synchronous and total: a missing path resolves to an empty tree.
 */
export interface ConfigSource {
  /** Provenance names, e.g. `["env", "dotenv:.env"]` for a combined source */
  readonly names: readonly string[]

  readonly leafForSequence: LeafForSequence

  resolve(path: readonly string[]): Resolution

  getValue(path: readonly string[]): PropertyTree<string>

  /**
   * Falls back to `that` for every path this source leaves empty.
   *
   * Passing a function defers building the fallback until a lookup needs it.
   */
  orElse(that: ConfigSource | (() => ConfigSource)): ConfigSource

  /**
   * Maps every key of a lookup path before delegating, e.g. to upper-case
   * descriptor keys for an env source.
   */
  convertKeys(f: (key: string) => string): ConfigSource
}

/**
 * A source after its backing data has been loaded, with the flat keys it
 * provides (`"db.port"`, `"servers[0].host"`) for unknown-key detection.
 */
export type LoadedSource = {
  readonly source: ConfigSource
  readonly keys: readonly string[]
}

/**
 * Loads configuration data from somewhere outside the process (a file, the
 * environment, the command line).
 *
 * Loaders given to `loadConfig` are consulted in order; earlier loaders take
 * precedence path by path.
 */
export interface SourceLoader {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.defaults", "json:config.json"
   */
  readonly name: string

  load(): Promise<LoadedSource>
}
