import {
  type ConfigSource,
  LeafForSequence,
  type LoadedSource,
  type Resolution,
} from "../ports/source"
import type { PropertyTree } from "../ports/tree"
import { flatten } from "./flatten"
import { renderPath } from "./path"
import { EMPTY, getPath, isEmpty } from "./tree"

type SourceParts = {
  names: () => readonly string[]
  leafForSequence: () => LeafForSequence
  resolve: (path: readonly string[]) => Resolution
}

class LazySource implements ConfigSource {
  constructor(private readonly parts: SourceParts) {}

  get names(): readonly string[] {
    return this.parts.names()
  }

  get leafForSequence(): LeafForSequence {
    return this.parts.leafForSequence()
  }

  resolve(path: readonly string[]): Resolution {
    return this.parts.resolve(path)
  }

  getValue(path: readonly string[]): PropertyTree<string> {
    return this.resolve(path).tree
  }

  orElse(that: ConfigSource | (() => ConfigSource)): ConfigSource {
    const other = typeof that === "function" ? that : () => that

    return new LazySource({
      names: () => [...new Set([...this.names, ...other().names])],
      leafForSequence: () => other().leafForSequence,
      resolve: (path) => {
        const first = this.resolve(path)
        if (!isEmpty(first.tree)) return first

        return other().resolve(path)
      },
    })
  }

  convertKeys(f: (key: string) => string): ConfigSource {
    return new LazySource({
      names: () => this.names,
      leafForSequence: () => this.leafForSequence,
      resolve: (path) => {
        const found = this.resolve(path.map(f))

        return { ...found, within: (tree) => found.within(tree).convertKeys(f) }
      },
    })
  }
}

/**
 * Wraps a lookup function. `lookup` must not throw for a missing path;
 * it returns `Empty` instead.
 */
export function fromFunction(
  name: string,
  lookup: (path: readonly string[]) => PropertyTree<string>,
  leafForSequence: LeafForSequence = LeafForSequence.Valid,
): ConfigSource {
  const names = [name]

  return new LazySource({
    names: () => names,
    leafForSequence: () => leafForSequence,
    resolve: (path) => ({
      tree: lookup(path),
      names,
      leafForSequence,
      within: (tree) => treeSource(tree, names, leafForSequence),
    }),
  })
}

export function fromTree(
  tree: PropertyTree<string>,
  name: string,
  leafForSequence: LeafForSequence = LeafForSequence.Valid,
): ConfigSource {
  return treeSource(tree, [name], leafForSequence)
}

export function treeSource(
  tree: PropertyTree<string>,
  names: readonly string[],
  leafForSequence: LeafForSequence,
): ConfigSource {
  return new LazySource({
    names: () => names,
    leafForSequence: () => leafForSequence,
    resolve: (path) => ({
      tree: getPath(tree, path),
      names,
      leafForSequence,
      within: (sub) => treeSource(sub, names, leafForSequence),
    }),
  })
}

export const emptySource: ConfigSource = new LazySource({
  names: () => [],
  leafForSequence: () => LeafForSequence.Valid,
  resolve: () => ({
    tree: EMPTY,
    names: [],
    leafForSequence: LeafForSequence.Valid,
    within: (tree) => treeSource(tree, [], LeafForSequence.Valid),
  }),
})

/**
 * Chains sources with `orElse`; the first one that answers a path wins.
 */
export function mergeSources(sources: readonly ConfigSource[]): ConfigSource {
  const [first, ...rest] = sources
  if (!first) return emptySource

  return rest.reduce((acc, source) => acc.orElse(source), first)
}

/**
 * One source over several trees, typically the alternatives returned by
 * `mergeAll`. Earlier trees are preferred.
 */
export function fromTrees(
  trees: readonly PropertyTree<string>[],
  name: string,
  leafForSequence: LeafForSequence = LeafForSequence.Valid,
): ConfigSource {
  return mergeSources(trees.map((tree) => fromTree(tree, name, leafForSequence)))
}

/**
 * Packs trees produced by a loader with the flat keys they hold.
 */
export function toLoadedSource(
  trees: readonly PropertyTree<string>[],
  name: string,
  leafForSequence: LeafForSequence = LeafForSequence.Valid,
): LoadedSource {
  const keys = new Set(trees.flatMap((tree) => flatten(tree).map(([path]) => renderPath(path))))

  return {
    source: fromTrees(trees, name, leafForSequence),
    keys: [...keys],
  }
}
