import fs from "node:fs/promises"
import path from "node:path"
import { ConfigSourceError } from "../../core/errors"
import { fromJsonValue } from "../../core/json"
import { toLoadedSource } from "../../core/source"
import { LeafForSequence, type LoadedSource, type SourceLoader } from "../../ports/source"
import { isMissingFile } from "../is-missing-file"

/**
 * Options for creating a JSON configuration source.
 */
export type JsonSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Provides nothing if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * JSON tells a value from a list, so a single value does not satisfy a
   * list unless this is `Valid`.
   *
   * @default LeafForSequence.Invalid
   */
  leafForSequence?: LeafForSequence
}

export class JsonSource implements SourceLoader {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<LoadedSource> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)
    const leafForSequence = this.opts.leafForSequence ?? LeafForSequence.Invalid

    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return toLoadedSource([], this.name, leafForSequence)
      }

      throw new ConfigSourceError(`Cannot read ${filePath}`, {
        source: this.name,
        context: { file: filePath },
        cause: err,
      })
    }

    let parsed: unknown

    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw new ConfigSourceError(`Invalid JSON in ${filePath}`, {
        source: this.name,
        context: { file: filePath },
        cause: err,
      })
    }

    return toLoadedSource([fromJsonValue(parsed)], this.name, leafForSequence)
  }
}
