import type { ConfigSource } from "./source"

/**
 * Outcome of converting between source text and a typed value.
 */
export type Conversion<A> =
  | { readonly success: true; readonly value: A }
  | { readonly success: false; readonly error: string }

export type Either<L, R> =
  | { readonly kind: "left"; readonly value: L }
  | { readonly kind: "right"; readonly value: R }

/**
 * Two-way conversion between a leaf string and `A`.
 */
export type ValueCodec<A> = {
  /** Name of the target type, shown in errors and docs ("int", "url") */
  readonly kind: string
  decode(raw: string): Conversion<A>
  encode(value: A): string
}

export type ValueDescriptor<A> = {
  readonly kind: "value"
  /** Leaf key; without one the value sits at the current path */
  readonly key?: string
  readonly codec: ValueCodec<A>
}

export type NestedDescriptor<A> = {
  readonly kind: "nested"
  readonly key: string
  readonly inner: Descriptor<A>
}

export type ZipParts<L, R, A> = {
  readonly left: Descriptor<L>
  readonly right: Descriptor<R>
  join(left: L, right: R): A
  split(value: A): readonly [L, R]
}

/**
 * The component types of a zip are hidden behind `open`, which hands them to
 * a caller that works for any `L` and `R`.
 */
export type ZipDescriptor<A> = {
  readonly kind: "zip"
  readonly open: <T>(use: <L, R>(parts: ZipParts<L, R, A>) => T) => T
}

export type OrElseEitherParts<L, R, A> = {
  readonly left: Descriptor<L>
  readonly right: Descriptor<R>
  fromLeft(value: L): A
  fromRight(value: R): A
  choose(value: A): Either<L, R>
}

export type OrElseEitherDescriptor<A> = {
  readonly kind: "or-else-either"
  readonly open: <T>(use: <L, R>(parts: OrElseEitherParts<L, R, A>) => T) => T
}

export type SequenceParts<E, A> = {
  readonly element: Descriptor<E>
  fromArray(items: E[]): A
  toArray(value: A): readonly E[]
}

export type SequenceDescriptor<A> = {
  readonly kind: "sequence"
  readonly open: <T>(use: <E>(parts: SequenceParts<E, A>) => T) => T
}

export type OptionalParts<I, A> = {
  readonly inner: Descriptor<I>
  fromOption(value: I | undefined): A
  toOption(value: A): I | undefined
}

export type OptionalDescriptor<A> = {
  readonly kind: "optional"
  readonly open: <T>(use: <I>(parts: OptionalParts<I, A>) => T) => T
}

export type DefaultDescriptor<A> = {
  readonly kind: "default"
  readonly inner: Descriptor<A>
  readonly fallback: A
}

export type TransformParts<I, A> = {
  readonly inner: Descriptor<I>
  forward(value: I): Conversion<A>
  backward(value: A): Conversion<I>
}

export type TransformDescriptor<A> = {
  readonly kind: "transform"
  readonly open: <T>(use: <I>(parts: TransformParts<I, A>) => T) => T
}

export type DescribeDescriptor<A> = {
  readonly kind: "describe"
  readonly inner: Descriptor<A>
  readonly description: string
}

export type SourcedFromDescriptor<A> = {
  readonly kind: "sourced-from"
  readonly inner: Descriptor<A>
  readonly source: ConfigSource
}

/**
 * A configuration schema for values of type `A`.
 *
 * Descriptors are plain data. `read` interprets one against a source, and
 * `write` interprets the same one against a value, so both directions
 * always agree on the shape.
 */
export type Descriptor<A> =
  | ValueDescriptor<A>
  | NestedDescriptor<A>
  | ZipDescriptor<A>
  | OrElseEitherDescriptor<A>
  | SequenceDescriptor<A>
  | OptionalDescriptor<A>
  | DefaultDescriptor<A>
  | TransformDescriptor<A>
  | DescribeDescriptor<A>
  | SourcedFromDescriptor<A>
