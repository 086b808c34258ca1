import type { LogLevelName } from "./log-level"

/**
 * Policy every adapter honours.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * @default "info"
   */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON. Meant for local runs.
   */
  prettify?: boolean
}
