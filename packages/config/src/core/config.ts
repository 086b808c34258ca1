import type { IConfig } from "../ports/config"
import type { Origin } from "../ports/result"
import { renderPath } from "./path"

type RenderedOrigin = {
  readonly path: string
  readonly sources: readonly string[]
}

const isUnder = (path: string, parent: string) =>
  path.startsWith(`${parent}.`) || path.startsWith(`${parent}[`)

export class Config<A> implements IConfig<A> {
  private readonly origins: readonly RenderedOrigin[]

  constructor(
    private readonly data: A,
    origins: readonly Origin[],
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
    this.origins = origins.map((o) => ({ path: renderPath(o.path), sources: o.sources }))
  }

  get value(): A {
    return this.data
  }

  explain(path: string): string {
    const exact = this.origins.filter((o) => o.path === path)
    const matched = exact.length ? exact : this.origins.filter((o) => isUnder(o.path, path))
    const sources = [...new Set(matched.flatMap((o) => o.sources))]

    return sources.length ? sources.join(", ") : "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.origins.flatMap((o) => o.sources))]
  }

  unknownKeys(): string[] {
    return [...this.providedKeys].filter(
      (key) => !this.origins.some((o) => o.path === key || isUnder(o.path, key)),
    )
  }
}
