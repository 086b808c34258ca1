import type {
  Descriptor,
  OptionalParts,
  OrElseEitherParts,
  SequenceParts,
  TransformParts,
  ZipParts,
} from "../ports/descriptor"
import type { ConfigPath, WriteResult } from "../ports/result"
import type { PropertyTree } from "../ports/tree"
import { DescriptorCollisionError } from "./errors"
import { EMPTY, leaf, recordOf, sequence } from "./tree"

/**
 * Writes `value` into a tree shaped by `descriptor`, the inverse of `read`.
 *
 * Fails only when a `transformOrFail` backward conversion rejects the
 * value. Throws {@link DescriptorCollisionError} when two combined
 * descriptors write the same leaf.
 */
export function write<A>(descriptor: Descriptor<A>, value: A): WriteResult {
  return writeAt(descriptor, value, [])
}

function writeAt<A>(d: Descriptor<A>, value: A, trail: ConfigPath): WriteResult {
  switch (d.kind) {
    case "value": {
      const node = leaf(d.codec.encode(value))
      return ok(d.key === undefined ? node : recordOf([[d.key, node]]))
    }
    case "nested": {
      const inner = writeAt(d.inner, value, [...trail, d.key])
      return inner.success ? ok(recordOf([[d.key, inner.tree]])) : inner
    }
    case "zip":
      return d.open<WriteResult>((parts) => writeZip(parts, value, trail))
    case "or-else-either":
      return d.open<WriteResult>((parts) => writeOrElseEither(parts, value, trail))
    case "sequence":
      return d.open<WriteResult>((parts) => writeSequence(parts, value, trail))
    case "optional":
      return d.open<WriteResult>((parts) => writeOptional(parts, value, trail))
    case "transform":
      return d.open<WriteResult>((parts) => writeTransform(parts, value, trail))
    case "default":
    case "describe":
    case "sourced-from":
      return writeAt(d.inner, value, trail)
  }
}

function ok(tree: PropertyTree<string>): WriteResult {
  return { success: true, tree }
}

function writeZip<L, R, A>(parts: ZipParts<L, R, A>, value: A, trail: ConfigPath): WriteResult {
  const [l, r] = parts.split(value)

  const left = writeAt(parts.left, l, trail)
  if (!left.success) return left

  const right = writeAt(parts.right, r, trail)
  if (!right.success) return right

  return ok(union(left.tree, right.tree, trail))
}

function writeOrElseEither<L, R, A>(
  parts: OrElseEitherParts<L, R, A>,
  value: A,
  trail: ConfigPath,
): WriteResult {
  const choice = parts.choose(value)

  return choice.kind === "left"
    ? writeAt(parts.left, choice.value, trail)
    : writeAt(parts.right, choice.value, trail)
}

function writeSequence<E, A>(parts: SequenceParts<E, A>, value: A, trail: ConfigPath): WriteResult {
  const trees: PropertyTree<string>[] = []

  for (const [i, item] of parts.toArray(value).entries()) {
    const written = writeAt(parts.element, item, [...trail, i])
    if (!written.success) return written

    trees.push(written.tree)
  }

  return ok(sequence(trees))
}

function writeOptional<I, A>(parts: OptionalParts<I, A>, value: A, trail: ConfigPath): WriteResult {
  const inner = parts.toOption(value)

  return inner === undefined ? ok(EMPTY) : writeAt(parts.inner, inner, trail)
}

function writeTransform<I, A>(
  parts: TransformParts<I, A>,
  value: A,
  trail: ConfigPath,
): WriteResult {
  const converted = parts.backward(value)

  if (!converted.success) {
    return { success: false, error: { path: trail, message: converted.error } }
  }

  return writeAt(parts.inner, converted.value, trail)
}

/**
 * Record union of the two halves of a zip. Anything other than two records
 * meeting at the same place is a collision.
 */
function union(
  left: PropertyTree<string>,
  right: PropertyTree<string>,
  trail: ConfigPath,
): PropertyTree<string> {
  if (left.kind === "empty") return right
  if (right.kind === "empty") return left

  if (left.kind === "record" && right.kind === "record") {
    const fields = new Map(left.fields)

    for (const [key, tree] of right.fields) {
      const existing = fields.get(key)
      fields.set(key, existing ? union(existing, tree, [...trail, key]) : tree)
    }

    return recordOf(fields)
  }

  throw new DescriptorCollisionError(trail)
}
