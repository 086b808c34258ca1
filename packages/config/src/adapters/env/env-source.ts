import { mapToTrees } from "../../core/from-map"
import { ConfigSourceError } from "../../core/errors"
import { toLoadedSource } from "../../core/source"
import { LeafForSequence, type LoadedSource, type SourceLoader } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are read; the prefix is
   * stripped from the key.
   */
  prefix?: string

  /**
   * @default process.env
   */
  env?: Record<string, string | undefined>

  /**
   * Splits variable names into nested paths. Must be a letter or `_`, the
   * only characters a portable variable name may use.
   *
   * @example "_" reads `DB_PORT` as `DB` → `PORT`
   */
  keyDelimiter?: string

  /**
   * Splits values into lists; the parts are trimmed.
   */
  valueDelimiter?: string

  /**
   * @default LeafForSequence.Valid
   */
  leafForSequence?: LeafForSequence
}

const VALID_ENV_DELIMITER = /^[A-Za-z_]$/

export class EnvSource implements SourceLoader {
  readonly name = "env"
  private readonly prefix?: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<LoadedSource> {
    const { keyDelimiter, valueDelimiter } = this.options

    if (keyDelimiter !== undefined && !VALID_ENV_DELIMITER.test(keyDelimiter)) {
      const shown = JSON.stringify(keyDelimiter)

      throw new ConfigSourceError(
        `Invalid key delimiter ${shown} for environment variables: use a letter or "_"`,
        { source: this.name, context: { keyDelimiter } },
      )
    }

    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined) continue

      if (!this.prefix) {
        values[key] = value
      } else if (key.startsWith(this.prefix)) {
        values[key.slice(this.prefix.length)] = value
      }
    }

    return toLoadedSource(
      mapToTrees(values, { keyDelimiter, valueDelimiter }),
      this.name,
      this.options.leafForSequence ?? LeafForSequence.Valid,
    )
  }
}
