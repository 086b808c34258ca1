import { type ConfigSource, LeafForSequence } from "../ports/source"
import type { PropertyTree } from "../ports/tree"
import { dropEmpty, mergeAll, unwrapSingletonLists } from "./merge"
import { fromTrees } from "./source"
import { fromPath, leaf, sequence } from "./tree"

export const COMMAND_LINE_ARGUMENTS = "command line arguments"

export type FromArgsOptions = {
  /**
   * Splits a flag's key into nested path segments, e.g. `"."` turns
   * `--db.port=5432` into `db` → `port`.
   */
  keyDelimiter?: string

  /**
   * Splits a value into a list, e.g. `","` turns `--regions=a,b` into two
   * values. Parts are not trimmed.
   */
  valueDelimiter?: string
}

export type ArgToken =
  | { readonly kind: "both"; readonly key: string; readonly value: string }
  | { readonly kind: "key-only"; readonly key: string }
  | { readonly kind: "value-only"; readonly value: string }

/**
 * Classifies one argument. Only the first `=` splits, and the part before it
 * is a key only when it starts with a dash.
 *
 * - `--key=value`, `-key=value`: both
 * - `--key`, `--key=`: key only
 * - `value`, `-`, `--`: value only, kept whole
 * - `a=b`, `=b`, `--=b`: value only, the part after `=`
 */
export function classifyArg(arg: string): ArgToken {
  const eq = arg.indexOf("=")
  const head = eq === -1 ? arg : arg.slice(0, eq)
  const key = head.startsWith("-") ? head.replace(/^-+/, "") : ""

  if (eq === -1) {
    return key ? { kind: "key-only", key } : { kind: "value-only", value: arg }
  }

  const value = arg.slice(eq + 1)

  if (!key) return { kind: "value-only", value }
  if (!value) return { kind: "key-only", key }

  return { kind: "both", key, value }
}

/**
 * Turns an argument list into trees, one alternative per way the partial
 * trees could be merged.
 */
export function argsToTrees(
  args: readonly string[],
  opts: FromArgsOptions = {},
): PropertyTree<string>[] {
  const { keyDelimiter, valueDelimiter } = opts

  const splitKey = (key: string): string[] => (keyDelimiter ? key.split(keyDelimiter) : [key])

  const nest = (key: string, tree: PropertyTree<string>) => fromPath(splitKey(key), tree)

  const toSeq = (value: string) =>
    sequence((valueDelimiter ? value.split(valueDelimiter) : [value]).map((v) => leaf(v)))

  const assign = (key: string, value: string) => nest(key, toSeq(value))

  const single = (token: ArgToken): PropertyTree<string>[] => {
    switch (token.kind) {
      case "both":
        return [assign(token.key, token.value)]
      case "value-only":
        return [toSeq(token.value)]
      case "key-only":
        return []
    }
  }

  const loop = (tokens: readonly ArgToken[]): PropertyTree<string>[] => {
    const [first, second] = tokens
    if (!first) return []
    if (!second) return single(first)

    const rest = tokens.slice(2)

    if (first.kind === "both") {
      const head = assign(first.key, first.value)

      switch (second.kind) {
        case "both":
          return [head, assign(second.key, second.value), ...loop(rest)]
        case "value-only":
          return [head, toSeq(second.value), ...loop(rest)]
        case "key-only": {
          const [next] = rest
          if (!next) return [head]

          const nested = single(next).map((tree) => nest(second.key, tree))
          return [head, ...nested, ...loop(rest.slice(1))]
        }
      }
    }

    if (first.kind === "key-only") {
      switch (second.kind) {
        case "both":
          return [nest(first.key, assign(second.key, second.value)), ...loop(rest)]
        case "value-only":
          return [assign(first.key, second.value), ...loop(rest)]
        case "key-only":
          return keyChain(first.key, second.key, rest)
      }
    }

    switch (second.kind) {
      case "both":
        return [toSeq(first.value), assign(second.key, second.value), ...loop(rest)]
      case "value-only":
        return [toSeq(first.value), toSeq(second.value), ...loop(rest)]
      case "key-only":
        return [toSeq(first.value), ...loop(rest).map((tree) => nest(second.key, tree))]
    }
  }

  // Two keys in a row: every key up to the first token that yields a tree
  // is one more nesting level. Without such a token the chain is dropped.
  const keyChain = (
    outer: string,
    inner: string,
    rest: readonly ArgToken[],
  ): PropertyTree<string>[] => {
    const keys = [inner]

    for (const [i, token] of rest.entries()) {
      const trees = single(token)

      if (trees.length > 0) {
        const path = keys.flatMap(splitKey)
        const nested = trees.map((tree) => nest(outer, fromPath(path, tree)))

        return [...nested, ...loop(rest.slice(i + 1))]
      }

      if (token.kind === "key-only") keys.push(token.key)
    }

    return []
  }

  const tokens = args.filter((arg) => arg.length > 0).map(classifyArg)

  return mergeAll(loop(tokens)).map((tree) => unwrapSingletonLists(dropEmpty(tree)))
}

/**
 * A source over command-line arguments.
 *
 * Repeated flags accumulate into a list, and flags without `=` take the next
 * argument as their value or as a nested flag.
 *
 * @example
 * ```typescript
 * const source = fromArgs(
 *   ["--db.username=1", "--db.password=hi", "--regions", "111,122"],
 *   { keyDelimiter: ".", valueDelimiter: "," },
 * )
 *
 * source.getValue(["regions"]) // Sequence[Leaf("111"), Leaf("122")]
 * ```
 */
export function fromArgs(args: readonly string[], opts: FromArgsOptions = {}): ConfigSource {
  return fromTrees(argsToTrees(args, opts), COMMAND_LINE_ARGUMENTS, LeafForSequence.Valid)
}
