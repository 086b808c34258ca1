import type { Descriptor } from "../ports/descriptor"

/** Path segment standing for "every element of the list" */
export const LIST_ELEMENT = "[]"

export type DocEntry = {
  /** Keys from the root; list elements appear as {@link LIST_ELEMENT} */
  readonly path: readonly string[]
  /** Name of the value type, e.g. "int" */
  readonly kind: string
  /** Descriptions from the outermost to the innermost */
  readonly descriptions: readonly string[]
  readonly optional: boolean
  readonly hasDefault: boolean
  /** `true` when the value belongs to one branch of an `orElse` */
  readonly alternative: boolean
  /** Sources bound with `from`, outermost first */
  readonly sources: readonly string[]
}

type DocState = Omit<DocEntry, "kind">

/**
 * Lists every value a descriptor reads, with what is known about it.
 */
export function generateDocs<A>(descriptor: Descriptor<A>): DocEntry[] {
  const out: DocEntry[] = []

  const go = <T>(d: Descriptor<T>, state: DocState): void => {
    switch (d.kind) {
      case "value":
        out.push({
          ...state,
          path: d.key === undefined ? state.path : [...state.path, d.key],
          kind: d.codec.kind,
        })
        return
      case "nested":
        go(d.inner, { ...state, path: [...state.path, d.key] })
        return
      case "zip":
        d.open<void>((p) => {
          go(p.left, state)
          go(p.right, state)
        })
        return
      case "or-else-either":
        d.open<void>((p) => {
          go(p.left, { ...state, alternative: true })
          go(p.right, { ...state, alternative: true })
        })
        return
      case "sequence":
        d.open<void>((p) => go(p.element, { ...state, path: [...state.path, LIST_ELEMENT] }))
        return
      case "optional":
        d.open<void>((p) => go(p.inner, { ...state, optional: true }))
        return
      case "default":
        go(d.inner, { ...state, hasDefault: true })
        return
      case "transform":
        d.open<void>((p) => go(p.inner, state))
        return
      case "describe":
        go(d.inner, { ...state, descriptions: [...state.descriptions, d.description] })
        return
      case "sourced-from":
        go(d.inner, { ...state, sources: [...state.sources, ...d.source.names] })
        return
    }
  }

  go(descriptor, {
    path: [],
    descriptions: [],
    optional: false,
    hasDefault: false,
    alternative: false,
    sources: [],
  })

  return out
}

export function renderDocPath(path: readonly string[]): string {
  if (path.length === 0) return "<root>"

  return path.reduce<string>((acc, segment) => {
    if (segment === LIST_ELEMENT) return `${acc}${LIST_ELEMENT}`
    return acc ? `${acc}.${segment}` : segment
  }, "")
}

const yesNo = (flag: boolean) => (flag ? "yes" : "no")

/**
 * Renders doc entries as a Markdown table.
 */
export function renderDocs(entries: readonly DocEntry[]): string {
  const header = [
    "| Path | Kind | Optional | Default | Alternative | Sources | Description |",
    "| --- | --- | --- | --- | --- | --- | --- |",
  ]

  const rows = entries.map((e) => {
    const cells = [
      renderDocPath(e.path),
      e.kind,
      yesNo(e.optional),
      yesNo(e.hasDefault),
      yesNo(e.alternative),
      e.sources.join(", "),
      e.descriptions.join("; "),
    ]

    return `| ${cells.join(" | ")} |`
  })

  return [...header, ...rows].join("\n")
}
