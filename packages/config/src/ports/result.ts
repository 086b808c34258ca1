import type { PathSegment, PropertyTree } from "./tree"

export type ConfigPath = readonly PathSegment[]

/**
 * Why a descriptor could not be read. Combined nodes mirror the descriptor,
 * so every independent failure of a read shows up in one report.
 */
export type ReadError =
  | {
      readonly kind: "missing-value"
      readonly path: ConfigPath
    }
  | {
      readonly kind: "conversion"
      readonly path: ConfigPath
      readonly message: string
      /** The offending source text, when there was one */
      readonly raw?: string
      readonly expected?: string
    }
  | {
      readonly kind: "format"
      readonly path: ConfigPath
      readonly message: string
    }
  | {
      /** A source threw while being queried. Never retried by `orElse`. */
      readonly kind: "source"
      readonly path: ConfigPath
      readonly message: string
      readonly code: string
    }
  | {
      readonly kind: "zip"
      readonly errors: readonly ReadError[]
    }
  | {
      readonly kind: "or-else"
      readonly errors: readonly ReadError[]
    }

/**
 * Where a value came from. `sources` is `["default"]` for `withDefault` literals.
 */
export type Origin = {
  readonly path: ConfigPath
  readonly sources: readonly string[]
}

export type ReadFailure = { readonly success: false; readonly error: ReadError }

export type ReadResult<A> =
  | { readonly success: true; readonly value: A; readonly origins: readonly Origin[] }
  | ReadFailure

export type WriteError = {
  readonly path: ConfigPath
  readonly message: string
}

export type WriteResult =
  | { readonly success: true; readonly tree: PropertyTree<string> }
  | { readonly success: false; readonly error: WriteError }
