import type {
  Conversion,
  DefaultDescriptor,
  DescribeDescriptor,
  Descriptor,
  Either,
  NestedDescriptor,
  OptionalDescriptor,
  OptionalParts,
  OrElseEitherDescriptor,
  OrElseEitherParts,
  SequenceDescriptor,
  SequenceParts,
  SourcedFromDescriptor,
  TransformDescriptor,
  TransformParts,
  ValueCodec,
  ValueDescriptor,
  ZipDescriptor,
  ZipParts,
} from "../ports/descriptor"
import type { ConfigSource } from "../ports/source"
import type { z } from "zod"
import {
  bigintCodec,
  booleanCodec,
  intCodec,
  numberCodec,
  stringCodec,
  urlCodec,
  uuidCodec,
  zodCodec,
} from "./codecs"

export function left<L, R = never>(value: L): Either<L, R> {
  return { kind: "left", value }
}

export function right<R, L = never>(value: R): Either<L, R> {
  return { kind: "right", value }
}

/**
 * A leaf converted with `codec`, under `key` or at the current path.
 */
export function value<A>(codec: ValueCodec<A>, key?: string): Descriptor<A> {
  const d: ValueDescriptor<A> = { kind: "value", key, codec }
  return Object.freeze(d)
}

export const string = (key?: string): Descriptor<string> => value(stringCodec, key)
export const int = (key?: string): Descriptor<number> => value(intCodec, key)
export const number = (key?: string): Descriptor<number> => value(numberCodec, key)
export const boolean = (key?: string): Descriptor<boolean> => value(booleanCodec, key)
export const bigint = (key?: string): Descriptor<bigint> => value(bigintCodec, key)
export const url = (key?: string): Descriptor<string> => value(urlCodec, key)
export const uuid = (key?: string): Descriptor<string> => value(uuidCodec, key)

/**
 * A leaf parsed by any zod schema that accepts a string.
 *
 * @example
 * ```typescript
 * const level = schemaValue(
 *   "LOG_LEVEL",
 *   "log level",
 *   z.string().pipe(z.enum(["debug", "info"])),
 *   String,
 * )
 * ```
 */
export function schemaValue<A>(
  key: string | undefined,
  kind: string,
  schema: z.ZodType<A, string>,
  encode: (value: A) => string,
): Descriptor<A> {
  return value(zodCodec(kind, schema, encode), key)
}

export function nested<A>(key: string, inner: Descriptor<A>): Descriptor<A> {
  const d: NestedDescriptor<A> = { kind: "nested", key, inner }
  return Object.freeze(d)
}

/**
 * Reads both descriptors and joins the results; writing splits the value
 * and writes both halves into one tree.
 */
export function combine<L, R, A>(
  left: Descriptor<L>,
  right: Descriptor<R>,
  join: (left: L, right: R) => A,
  split: (value: A) => readonly [L, R],
): Descriptor<A> {
  const parts: ZipParts<L, R, A> = { left, right, join, split }
  const d: ZipDescriptor<A> = { kind: "zip", open: (use) => use(parts) }
  return Object.freeze(d)
}

export function zip<L, R>(
  left: Descriptor<L>,
  right: Descriptor<R>,
): Descriptor<readonly [L, R]> {
  return combine(
    left,
    right,
    (l, r) => [l, r] as const,
    (pair) => pair,
  )
}

/**
 * Reads `left`, or `right` when `left` fails for any reason other than a
 * failing source.
 */
export function orElseEither<L, R>(
  left: Descriptor<L>,
  right: Descriptor<R>,
): Descriptor<Either<L, R>> {
  const parts: OrElseEitherParts<L, R, Either<L, R>> = {
    left,
    right,
    fromLeft: (v) => ({ kind: "left", value: v }),
    fromRight: (v) => ({ kind: "right", value: v }),
    choose: (v) => v,
  }
  const d: OrElseEitherDescriptor<Either<L, R>> = {
    kind: "or-else-either",
    open: (use) => use(parts),
  }
  return Object.freeze(d)
}

/**
 * Same-type fallback. Writing always goes through `left`.
 */
export function orElse<A>(left: Descriptor<A>, right: Descriptor<A>): Descriptor<A> {
  const parts: OrElseEitherParts<A, A, A> = {
    left,
    right,
    fromLeft: (v) => v,
    fromRight: (v) => v,
    choose: (v) => ({ kind: "left", value: v }),
  }
  const d: OrElseEitherDescriptor<A> = { kind: "or-else-either", open: (use) => use(parts) }
  return Object.freeze(d)
}

export function sequenceOf<E>(element: Descriptor<E>): Descriptor<E[]> {
  const parts: SequenceParts<E, E[]> = {
    element,
    fromArray: (items) => items,
    toArray: (items) => items,
  }
  const d: SequenceDescriptor<E[]> = { kind: "sequence", open: (use) => use(parts) }
  return Object.freeze(d)
}

/**
 * A list under `key`.
 *
 * @example
 * ```typescript
 * list("ports", int()) // reads --ports=80 --ports=443 as [80, 443]
 * ```
 */
export function list<E>(key: string, element: Descriptor<E>): Descriptor<E[]> {
  return nested(key, sequenceOf(element))
}

/**
 * `undefined` when nothing the inner descriptor reads is present; a value
 * that is present but invalid still fails.
 */
export function optional<A>(inner: Descriptor<A>): Descriptor<A | undefined> {
  const parts: OptionalParts<A, A | undefined> = {
    inner,
    fromOption: (v) => v,
    toOption: (v) => v,
  }
  const d: OptionalDescriptor<A | undefined> = { kind: "optional", open: (use) => use(parts) }
  return Object.freeze(d)
}

/**
 * Falls back to `fallback` when nothing the inner descriptor reads is
 * present. Writing ignores the fallback.
 */
export function withDefault<A>(inner: Descriptor<A>, fallback: A): Descriptor<A> {
  const d: DefaultDescriptor<A> = { kind: "default", inner, fallback }
  return Object.freeze(d)
}

export function transformOrFail<I, A>(
  inner: Descriptor<I>,
  forward: (value: I) => Conversion<A>,
  backward: (value: A) => Conversion<I>,
): Descriptor<A> {
  const parts: TransformParts<I, A> = { inner, forward, backward }
  const d: TransformDescriptor<A> = { kind: "transform", open: (use) => use(parts) }
  return Object.freeze(d)
}

export function transform<I, A>(
  inner: Descriptor<I>,
  forward: (value: I) => A,
  backward: (value: A) => I,
): Descriptor<A> {
  return transformOrFail(
    inner,
    (v) => ({ success: true, value: forward(v) }),
    (v) => ({ success: true, value: backward(v) }),
  )
}

/**
 * Checks a read value with `predicate`; a rejected value fails with `message`.
 */
export function refine<A>(
  inner: Descriptor<A>,
  predicate: (value: A) => boolean,
  message: string,
): Descriptor<A> {
  const check = (v: A): Conversion<A> =>
    predicate(v) ? { success: true, value: v } : { success: false, error: message }

  return transformOrFail(inner, check, check)
}

export function withDescription<A>(inner: Descriptor<A>, description: string): Descriptor<A> {
  const d: DescribeDescriptor<A> = { kind: "describe", inner, description }
  return Object.freeze(d)
}

/**
 * Reads `inner` from `source` instead of the source given to `read`.
 */
export function from<A>(inner: Descriptor<A>, source: ConfigSource): Descriptor<A> {
  const d: SourcedFromDescriptor<A> = { kind: "sourced-from", inner, source }
  return Object.freeze(d)
}
