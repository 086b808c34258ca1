import { Writable } from "node:stream"
import pino from "pino"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("writes message and context to the destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "config" })

    logger.info("source loaded", { source: "dotenv:.env" })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: 30,
      msg: "source loaded",
      module: "config",
      source: "dotenv:.env",
    })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const err = new Error("read failed", { cause: new Error("EACCES") })

    logger.error("cannot load", { err })

    const payload = JSON.parse(lines[0] ?? "")
    expect(payload.err.message).toBe("read failed")
    expect(payload.err.cause.message).toBe("EACCES")
  })

  it("derives from a base logger when one is given", () => {
    const { lines, destination } = makeLineDestination()
    const base = pino({ level: "debug" }, destination).child({ service: "billing" })

    const logger = new PinoLogger({ base }, {}, { module: "config" })

    logger.debug("resolved")

    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      service: "billing",
      module: "config",
      msg: "resolved",
    })
  })

  it("child() keeps writing to the same destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.child({ source: "env" }).warn("unknown key")

    expect(JSON.parse(lines[0] ?? "")).toMatchObject({ level: 40, source: "env" })
  })
})
