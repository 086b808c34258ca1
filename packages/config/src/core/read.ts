import { toAppError } from "@treeconf/errors"
import type {
  DefaultDescriptor,
  Descriptor,
  OptionalParts,
  OrElseEitherParts,
  SequenceParts,
  TransformParts,
  ValueDescriptor,
  ZipParts,
} from "../ports/descriptor"
import type { ConfigPath, Origin, ReadError, ReadFailure, ReadResult } from "../ports/result"
import { type ConfigSource, LeafForSequence, type Resolution } from "../ports/source"
import type { PropertyTree, SequenceNode } from "../ports/tree"
import { emptySource } from "./source"
import { isEmpty } from "./tree"

type ReadContext = {
  readonly source: ConfigSource
  /** Lookup path in the current source */
  readonly path: readonly string[]
  /** Full path from the root of the read, list indexes included, for reporting */
  readonly trail: ConfigPath
}

type Query = { readonly success: true; readonly resolution: Resolution } | ReadFailure

/**
 * Reads a typed value out of `source`.
 *
 * Never throws for bad data: every failure is described in the returned
 * error tree, and an exception thrown by the source becomes a `source` error.
 *
 * @example
 * ```typescript
 * const result = read(int("port"), fromMap({ port: "8080" }))
 *
 * if (result.success) result.value // 8080
 * ```
 */
export function read<A>(
  descriptor: Descriptor<A>,
  source: ConfigSource = emptySource,
): ReadResult<A> {
  return readAt(descriptor, { source, path: [], trail: [] })
}

function readAt<A>(d: Descriptor<A>, ctx: ReadContext): ReadResult<A> {
  switch (d.kind) {
    case "value":
      return readValue(d, d.key === undefined ? ctx : descend(ctx, d.key))
    case "nested":
      return readAt(d.inner, descend(ctx, d.key))
    case "zip":
      return d.open<ReadResult<A>>((parts) => readZip(parts, ctx))
    case "or-else-either":
      return d.open<ReadResult<A>>((parts) => readOrElseEither(parts, ctx))
    case "sequence":
      return d.open<ReadResult<A>>((parts) => readSequence(parts, ctx))
    case "optional":
      return d.open<ReadResult<A>>((parts) => readOptional(parts, ctx))
    case "default":
      return readDefault(d, ctx)
    case "transform":
      return d.open<ReadResult<A>>((parts) => readTransform(parts, ctx))
    case "describe":
      return readAt(d.inner, ctx)
    case "sourced-from":
      return readAt(d.inner, { ...ctx, source: d.source })
  }
}

function descend(ctx: ReadContext, key: string): ReadContext {
  return { ...ctx, path: [...ctx.path, key], trail: [...ctx.trail, key] }
}

function fail(error: ReadError): ReadFailure {
  return { success: false, error }
}

function query(ctx: ReadContext): Query {
  try {
    return { success: true, resolution: ctx.source.resolve(ctx.path) }
  } catch (err) {
    const appError = toAppError(err, "config_source_failed")

    return fail({
      kind: "source",
      path: ctx.trail,
      message: appError.message,
      code: appError.code,
    })
  }
}

function readValue<A>(d: ValueDescriptor<A>, ctx: ReadContext): ReadResult<A> {
  const q = query(ctx)
  if (!q.success) return q

  const { tree, names } = q.resolution

  if (isEmpty(tree)) return fail({ kind: "missing-value", path: ctx.trail })

  const raw =
    tree.kind === "leaf" ? tree.value : tree.kind === "sequence" ? firstLeaf(tree) : undefined

  if (raw === undefined) {
    return fail({
      kind: "format",
      path: ctx.trail,
      message: `expected a value, found ${describeNode(tree)}`,
    })
  }

  const decoded = d.codec.decode(raw)

  if (!decoded.success) {
    return fail({
      kind: "conversion",
      path: ctx.trail,
      raw,
      expected: d.codec.kind,
      message: decoded.error,
    })
  }

  return { success: true, value: decoded.value, origins: [{ path: ctx.trail, sources: names }] }
}

function readZip<L, R, A>(parts: ZipParts<L, R, A>, ctx: ReadContext): ReadResult<A> {
  const l = readAt(parts.left, ctx)
  const r = readAt(parts.right, ctx)

  if (!l.success) return fail(r.success ? l.error : zipError(l.error, r.error))
  if (!r.success) return r

  return {
    success: true,
    value: parts.join(l.value, r.value),
    origins: [...l.origins, ...r.origins],
  }
}

function readOrElseEither<L, R, A>(
  parts: OrElseEitherParts<L, R, A>,
  ctx: ReadContext,
): ReadResult<A> {
  const l = readAt(parts.left, ctx)

  if (l.success) return { success: true, value: parts.fromLeft(l.value), origins: l.origins }
  if (hasSourceError(l.error)) return l

  const r = readAt(parts.right, ctx)

  if (r.success) return { success: true, value: parts.fromRight(r.value), origins: r.origins }

  return fail(orElseError(l.error, r.error))
}

function readSequence<E, A>(parts: SequenceParts<E, A>, ctx: ReadContext): ReadResult<A> {
  const q = query(ctx)
  if (!q.success) return q

  const { tree, leafForSequence, within } = q.resolution

  let items: readonly PropertyTree<string>[]

  if (tree.kind === "sequence") {
    items = tree.items
  } else if (isEmpty(tree)) {
    return fail({ kind: "missing-value", path: ctx.trail })
  } else if (leafForSequence === LeafForSequence.Valid) {
    items = [tree]
  } else {
    return fail({
      kind: "format",
      path: ctx.trail,
      message: `expected a list, found ${describeNode(tree)}`,
    })
  }

  const values: E[] = []
  const origins: Origin[] = []

  for (const [i, item] of items.entries()) {
    const r = readAt(parts.element, {
      source: within(item),
      path: [],
      trail: [...ctx.trail, i],
    })

    if (!r.success) return r

    values.push(r.value)
    origins.push(...r.origins)
  }

  return { success: true, value: parts.fromArray(values), origins }
}

function readOptional<I, A>(parts: OptionalParts<I, A>, ctx: ReadContext): ReadResult<A> {
  const r = readAt(parts.inner, ctx)

  if (r.success) return { success: true, value: parts.fromOption(r.value), origins: r.origins }
  if (!isAbsent(r.error, parts.inner, ctx)) return r

  return { success: true, value: parts.fromOption(undefined), origins: [] }
}

function readDefault<A>(d: DefaultDescriptor<A>, ctx: ReadContext): ReadResult<A> {
  const r = readAt(d.inner, ctx)

  if (r.success || !isAbsent(r.error, d.inner, ctx)) return r

  return {
    success: true,
    value: d.fallback,
    origins: valuePaths(d.inner, ctx.trail).map((path) => ({ path, sources: ["default"] })),
  }
}

function readTransform<I, A>(parts: TransformParts<I, A>, ctx: ReadContext): ReadResult<A> {
  const r = readAt(parts.inner, ctx)
  if (!r.success) return r

  const converted = parts.forward(r.value)

  if (!converted.success) {
    const [only, ...others] = valuePaths(parts.inner, ctx.trail)

    return fail({
      kind: "conversion",
      path: only && others.length === 0 ? only : ctx.trail,
      message: converted.error,
    })
  }

  return { success: true, value: converted.value, origins: r.origins }
}

function zipError(left: ReadError, right: ReadError): ReadError {
  const spread = (e: ReadError) => (e.kind === "zip" ? e.errors : [e])
  return { kind: "zip", errors: [...spread(left), ...spread(right)] }
}

function orElseError(left: ReadError, right: ReadError): ReadError {
  const spread = (e: ReadError) => (e.kind === "or-else" ? e.errors : [e])
  return { kind: "or-else", errors: [...spread(left), ...spread(right)] }
}

function hasSourceError(error: ReadError): boolean {
  switch (error.kind) {
    case "source":
      return true
    case "zip":
    case "or-else":
      return error.errors.some(hasSourceError)
    default:
      return false
  }
}

function onlyMissing(error: ReadError): boolean {
  switch (error.kind) {
    case "missing-value":
      return true
    case "zip":
    case "or-else":
      return error.errors.every(onlyMissing)
    default:
      return false
  }
}

/**
 * A failed read counts as absence only when every failure is a missing value
 * and no leaf the descriptor would read exists in the source.
 */
function isAbsent<A>(error: ReadError, d: Descriptor<A>, ctx: ReadContext): boolean {
  return onlyMissing(error) && !anyPresent(d, ctx)
}

function anyPresent<A>(d: Descriptor<A>, ctx: ReadContext): boolean {
  switch (d.kind) {
    case "value":
      return present(d.key === undefined ? ctx : descend(ctx, d.key))
    case "nested":
      return anyPresent(d.inner, descend(ctx, d.key))
    case "zip":
      return d.open<boolean>((p) => anyPresent(p.left, ctx) || anyPresent(p.right, ctx))
    case "or-else-either":
      return d.open<boolean>((p) => anyPresent(p.left, ctx) || anyPresent(p.right, ctx))
    case "sequence":
      return present(ctx)
    case "optional":
      return d.open<boolean>((p) => anyPresent(p.inner, ctx))
    case "transform":
      return d.open<boolean>((p) => anyPresent(p.inner, ctx))
    case "default":
    case "describe":
      return anyPresent(d.inner, ctx)
    case "sourced-from":
      return anyPresent(d.inner, { ...ctx, source: d.source })
  }
}

// A source that throws counts as present, so its error is reported.
function present(ctx: ReadContext): boolean {
  const q = query(ctx)
  return !q.success || !isEmpty(q.resolution.tree)
}

/**
 * Paths of every value a descriptor reads, relative to `trail`. List
 * elements are represented by the list's own path.
 */
export function valuePaths<A>(d: Descriptor<A>, trail: ConfigPath): ConfigPath[] {
  switch (d.kind) {
    case "value":
      return [d.key === undefined ? trail : [...trail, d.key]]
    case "nested":
      return valuePaths(d.inner, [...trail, d.key])
    case "zip":
      return d.open<ConfigPath[]>((p) => [
        ...valuePaths(p.left, trail),
        ...valuePaths(p.right, trail),
      ])
    case "or-else-either":
      return d.open<ConfigPath[]>((p) => [
        ...valuePaths(p.left, trail),
        ...valuePaths(p.right, trail),
      ])
    case "sequence":
      return [trail]
    case "optional":
      return d.open<ConfigPath[]>((p) => valuePaths(p.inner, trail))
    case "transform":
      return d.open<ConfigPath[]>((p) => valuePaths(p.inner, trail))
    case "default":
    case "describe":
    case "sourced-from":
      return valuePaths(d.inner, trail)
  }
}

function firstLeaf(tree: SequenceNode<string>): string | undefined {
  for (const item of tree.items) {
    if (item.kind === "leaf") return item.value
    if (item.kind === "sequence") {
      const found = firstLeaf(item)
      if (found !== undefined) return found
    }
  }

  return undefined
}

function describeNode(tree: PropertyTree<string>): string {
  switch (tree.kind) {
    case "record":
      return "a record"
    case "sequence":
      return "a list of records"
    case "leaf":
      return "a single value"
    case "empty":
      return "nothing"
  }
}
