import type { ReadError } from "../ports/result"
import { renderPath } from "./path"

export const REPORT_HEADER = "Configuration could not be read"

/**
 * Renders a read error as an indented report, one failure per line.
 *
 * @example
 * ```text
 * Configuration could not be read
 * - all of the following must be fixed:
 *   - missing value at db.host
 *   - cannot convert "abc" to int at db.port: expected an integer
 * ```
 */
export function prettyPrint(error: ReadError): string {
  const lines = [REPORT_HEADER]

  const go = (e: ReadError, depth: number): void => {
    const indent = "  ".repeat(depth)

    switch (e.kind) {
      case "missing-value":
        lines.push(`${indent}- missing value at ${renderPath(e.path)}`)
        return
      case "conversion": {
        const at = renderPath(e.path)

        lines.push(
          e.raw === undefined
            ? `${indent}- conversion failed at ${at}: ${e.message}`
            : `${indent}- cannot convert "${e.raw}" to ${e.expected ?? "value"} at ${at}: ${e.message}`,
        )
        return
      }
      case "format":
        lines.push(`${indent}- malformed value at ${renderPath(e.path)}: ${e.message}`)
        return
      case "source":
        lines.push(`${indent}- source failure at ${renderPath(e.path)} (${e.code}): ${e.message}`)
        return
      case "zip":
        lines.push(`${indent}- all of the following must be fixed:`)
        for (const child of e.errors) go(child, depth + 1)
        return
      case "or-else":
        lines.push(`${indent}- none of the alternatives could be read:`)
        for (const child of e.errors) go(child, depth + 1)
        return
    }
  }

  go(error, 0)

  return lines.join("\n")
}
