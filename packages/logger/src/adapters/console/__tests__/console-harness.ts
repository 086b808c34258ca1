import {
  type CapturedLog,
  type LoggerHarness,
  toCapturedLog,
} from "../../../ports/__tests__/logger-harness"
import { logLevelNames } from "../../../ports/log-level"
import { ConsoleLogger } from "../console-logger"

export function consoleHarness(): LoggerHarness {
  return {
    name: "ConsoleLogger",
    make: (opts) => {
      const captured: CapturedLog[] = []

      const capture = (line: string) => {
        const payload: Record<string, unknown> = JSON.parse(line)
        const level = logLevelNames.find((name) => name === payload.level) ?? "info"
        captured.push(toCapturedLog(level, payload.message, payload))
      }

      const fakeConsole = {
        trace: capture,
        debug: capture,
        info: capture,
        warn: capture,
        error: capture,
      }

      return {
        logger: new ConsoleLogger(
          { console: fakeConsole },
          { level: opts?.level ?? "trace", prettify: false },
          opts?.context,
        ),
        read: () => [...captured],
        clear: () => {
          captured.length = 0
        },
      }
    },
  }
}
