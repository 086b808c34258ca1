import { serializeError } from "@treeconf/errors"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { LEVEL_SEVERITY, type LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type ConsoleWriter = Pick<Console, "trace" | "debug" | "info" | "warn" | "error">

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

type ConsoleMethod = keyof ConsoleWriter

const LEVEL_TO_CONSOLE_METHOD: Record<LogLevelName, ConsoleMethod> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
}

const RESERVED_KEYS = ["timestamp", "level", "message"] as const

export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly context: LogContextPatch

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.context = stripUndefined(context)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private shouldLog(level: LogLevelName): boolean {
    const min = this.opts.level ?? "info"
    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>) {
    if (!this.shouldLog(level)) return

    const safeMeta = meta ? stripUndefined(meta) : {}
    for (const key of RESERVED_KEYS) delete safeMeta[key]

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...safeMeta,
    }

    if (payload.err !== undefined) {
      payload.err = serializeError(payload.err, { includeStack: true })
    }

    const output = this.opts.prettify ? formatPretty(payload) : safeStringify(payload)

    this.sink[LEVEL_TO_CONSOLE_METHOD[level]](output)
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

/**
 * `<timestamp> <LEVEL> <message> {rest}`; an error's stack follows on
 * indented lines, and a multi-line message (an error report) keeps its lines.
 */
function formatPretty(payload: Record<string, unknown>): string {
  const { timestamp, level, message, err, ...rest } = payload

  const stack = isRecord(err) && typeof err.stack === "string" ? err.stack : undefined

  if (isRecord(err)) {
    const { stack: _stack, ...errWithoutStack } = err
    rest.err = errWithoutStack
  } else if (err !== undefined) {
    rest.err = err
  }

  const tail = Object.keys(rest).length ? ` ${safeStringify(rest)}` : ""
  const line = `${String(timestamp)} ${String(level).toUpperCase()} ${String(message)}${tail}`

  if (!stack) return line

  const indentedStack = stack
    .split("\n")
    .map((l) => `  ${l}`)
    .join("\n")

  return `${line}\n${indentedStack}`
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts)
}
