import { BaseError, type ErrorContext } from "@treeconf/errors"
import type { ConfigPath, ReadError } from "../ports/result"
import { renderPath } from "./path"

/**
 * Thrown by `loadConfig` when the descriptor cannot be read. The message is
 * the full report; the structured error sits in `context.error`.
 */
export class ConfigReadError extends BaseError<"config_read_failed"> {
  constructor(report: string, error: ReadError) {
    super(report, { code: "config_read_failed", context: { report, error } })
  }
}

export class ConfigSourceError extends BaseError<"config_source_failed"> {
  constructor(
    message: string,
    options: { source: string; context?: ErrorContext; cause?: unknown; isRetryable?: boolean },
  ) {
    super(message, {
      code: "config_source_failed",
      context: { source: options.source, ...options.context },
      cause: options.cause,
      isRetryable: options.isRetryable,
    })
  }
}

/**
 * Two zipped descriptors wrote to the same place. The schema is wrong, not the data.
 */
export class DescriptorCollisionError extends BaseError<"descriptor_collision"> {
  constructor(path: ConfigPath) {
    super(`Two descriptors write the same value at ${renderPath(path)}`, {
      code: "descriptor_collision",
      context: { path: renderPath(path) },
      isOperational: false,
    })
  }
}
