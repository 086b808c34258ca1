import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { ConfigSourceError } from "../../core/errors"
import { mapToTrees } from "../../core/from-map"
import { toLoadedSource } from "../../core/source"
import { LeafForSequence, type LoadedSource, type SourceLoader } from "../../ports/source"
import { isMissingFile } from "../is-missing-file"

/**
 * Options for creating a dotenv configuration source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
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
   * Splits keys into nested paths, e.g. `"__"` reads `DB__PORT` as `DB` → `PORT`.
   */
  keyDelimiter?: string

  /**
   * Splits values into lists; the parts are trimmed.
   */
  valueDelimiter?: string
}

export class DotenvSource implements SourceLoader {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<LoadedSource> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return toLoadedSource([], this.name)
      }

      throw new ConfigSourceError(`Cannot read ${filePath}`, {
        source: this.name,
        context: { file: filePath },
        cause: err,
      })
    }

    const trees = mapToTrees(parse(content), {
      keyDelimiter: this.opts.keyDelimiter,
      valueDelimiter: this.opts.valueDelimiter,
    })

    return toLoadedSource(trees, this.name, LeafForSequence.Valid)
  }
}
