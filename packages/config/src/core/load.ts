import { type Logger, NullLogger } from "@treeconf/logger"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { Descriptor } from "../ports/descriptor"
import type { LoadedSource, SourceLoader } from "../ports/source"
import { Config } from "./config"
import { ConfigReadError } from "./errors"
import { prettyPrint } from "./pretty-print"
import { read } from "./read"
import { mergeSources } from "./source"

export type LoadConfigOptions<A> = {
  descriptor: Descriptor<A>

  /**
   * Loaders in order of precedence: for every path, the first loader that
   * has a value wins.
   *
   * @default [new EnvSource()]
   */
  sources?: SourceLoader[]

  /**
   * @default NullLogger
   */
  logger?: Logger
}

/**
 * Loads every source, then reads `descriptor` from them.
 *
 * @throws {ConfigReadError} when the descriptor cannot be read; the message
 * is the pretty-printed report.
 */
export async function loadConfig<A>({
  descriptor,
  sources,
  logger = new NullLogger(),
}: LoadConfigOptions<A>): Promise<IConfig<A>> {
  const log = logger.child({ module: "config" })
  const loaders = sources ?? [new EnvSource()]
  const loaded: LoadedSource[] = []

  for (const loader of loaders) {
    const started = Date.now()

    try {
      const result = await loader.load()
      loaded.push(result)

      log.debug("source loaded", {
        source: loader.name,
        durationMs: Date.now() - started,
        keys: result.keys.length,
      })
    } catch (err) {
      log.error("source failed to load", { source: loader.name, err })
      throw err
    }
  }

  const result = read(descriptor, mergeSources(loaded.map((l) => l.source)))

  if (!result.success) {
    const report = prettyPrint(result.error)
    log.error("configuration could not be read", { report })

    throw new ConfigReadError(report, result.error)
  }

  const config = new Config(
    result.value,
    result.origins,
    new Set(loaded.flatMap((l) => l.keys)),
  )

  log.info("configuration resolved", { sources: config.sourcesUsed() })

  return config
}
