export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the configuration source involved, e.g. "env" or "dotenv:.env" */
  source: string
  /** Rendered descriptor path, e.g. "db.port" or "servers[1].host" */
  configPath: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
