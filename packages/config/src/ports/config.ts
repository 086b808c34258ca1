/**
 * Configuration container returned by `loadConfig`.
 *
 * @typeParam A - The type described by the descriptor that was read.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   descriptor: combine(
 *     withDefault(int("PORT"), 3000),
 *     string("DATABASE_URL"),
 *     (port, databaseUrl) => ({ port, databaseUrl }),
 *     (c) => [c.port, c.databaseUrl],
 *   ),
 *   sources: [new EnvSource(), new DotenvSource({ file: ".env", required: false })],
 * })
 *
 * config.value.port             // 3000
 * config.explain("DATABASE_URL") // "env"
 * config.explain("PORT")         // "default"
 * ```
 */
export interface IConfig<A> {
  /** Fully read config value */
  readonly value: A

  /**
   * Explains which source provided the value at a path.
   *
   * @param path - Rendered path, e.g. "db.port" or "servers[1].host".
   * @returns The source names joined by ", ", or "default" for defaults and unread paths.
   */
  explain(path: string): string

  /**
   * Returns the names of all sources that contributed at least one value,
   * in the order values were read.
   */
  sourcesUsed(): string[]

  /**
   * Returns keys present in sources but never read by the descriptor.
   *
   * Useful for detecting typos, stale config, or misconfigured sources.
   */
  unknownKeys(): string[]
}
