import { ConfigSourceError } from "../../../core/errors"
import { EMPTY, leaf, sequence } from "../../../core/tree"
import { LeafForSequence } from "../../../ports/source"
import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("reads every variable when there is no prefix", async () => {
    const env = {
      PORT: "3000",
      HOST: "localhost",
      DEBUG: "true",
    }

    const { source, keys } = await new EnvSource({ env }).load()

    expect(source.getValue(["PORT"])).toEqual(leaf("3000"))
    expect(source.getValue(["DEBUG"])).toEqual(leaf("true"))
    expect(keys).toEqual(["PORT", "HOST", "DEBUG"])
  })

  it("filters and strips the prefix when provided", async () => {
    const env = {
      APP_PORT: "3000",
      APP_HOST: "localhost",
      OTHER_KEY: "ignored",
      PATH: "/usr/bin",
    }

    const { source, keys } = await new EnvSource({ env, prefix: "APP_" }).load()

    expect(source.getValue(["PORT"])).toEqual(leaf("3000"))
    expect(source.getValue(["OTHER_KEY"])).toEqual(EMPTY)
    expect(keys).toEqual(["PORT", "HOST"])
  })

  it("skips undefined variables", async () => {
    const { keys } = await new EnvSource({ env: { SET: "1", UNSET: undefined } }).load()

    expect(keys).toEqual(["SET"])
  })

  it("nests keys split by the key delimiter", async () => {
    const env = { APP_DB_HOST: "db.internal", APP_DB_PORT: "5432" }

    const { source, keys } = await new EnvSource({ env, prefix: "APP_", keyDelimiter: "_" }).load()

    expect(source.getValue(["DB", "HOST"])).toEqual(leaf("db.internal"))
    expect(keys).toEqual(["DB.HOST", "DB.PORT"])
  })

  it("splits values by the value delimiter", async () => {
    const { source } = await new EnvSource({
      env: { SERVERS: "a, b" },
      valueDelimiter: ",",
    }).load()

    expect(source.getValue(["SERVERS"])).toEqual(sequence([leaf("a"), leaf("b")]))
  })

  it("rejects a key delimiter that cannot appear in a variable name", async () => {
    const source = new EnvSource({ env: {}, keyDelimiter: "." })

    await expect(source.load()).rejects.toThrow(ConfigSourceError)
  })

  it("passes the sequence policy on", async () => {
    const { source } = await new EnvSource({
      env: { A: "1" },
      leafForSequence: LeafForSequence.Invalid,
    }).load()

    expect(source.leafForSequence).toBe(LeafForSequence.Invalid)
  })

  it("uses injected env over process.env", async () => {
    const { source, keys } = await new EnvSource({ env: { CUSTOM: "injected_value" } }).load()

    expect(keys).toEqual(["CUSTOM"])
    expect(source.getValue(["PATH"])).toEqual(EMPTY)
  })
})
