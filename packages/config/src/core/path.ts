import type { ConfigPath } from "../ports/result"

/**
 * Renders a path as `db.port` or `servers[1].host`; the root is `<root>`.
 */
export function renderPath(path: ConfigPath): string {
  if (path.length === 0) return "<root>"

  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`
    return acc ? `${acc}.${segment}` : segment
  }, "")
}
