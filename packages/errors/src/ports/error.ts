/**
 * Machine-readable error code, snake_case by convention
 * (e.g. "config_read_failed").
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: paths, source names, reports.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the operation might succeed (e.g. a file that appears later) */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (`true`) or a programming
   * error such as a malformed descriptor (`false`).
   *
   * @remarks
   * - Operational: a missing key, an unreadable file, a value that fails conversion.
   * - Non-operational: two zipped descriptors writing the same leaf.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
