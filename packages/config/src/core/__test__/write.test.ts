import {
  combine,
  int,
  list,
  nested,
  optional,
  orElseEither,
  refine,
  right,
  string,
  withDefault,
  zip,
} from "../descriptor"
import { DescriptorCollisionError } from "../errors"
import { write } from "../write"
import { EMPTY, leaf, record, sequence } from "../tree"

const server = combine(
  string("host"),
  int("port"),
  (host, port) => ({ host, port }),
  (s) => [s.host, s.port] as const,
)

describe("write", () => {
  it("writes a value under its key", () => {
    expect(write(int("port"), 8080)).toEqual({ success: true, tree: record({ port: leaf("8080") }) })
  })

  it("writes a value without a key as a bare leaf", () => {
    expect(write(string(), "x")).toEqual({ success: true, tree: leaf("x") })
  })

  it("merges the two halves of a zip into one record", () => {
    expect(write(nested("db", server), { host: "h", port: 1 })).toEqual({
      success: true,
      tree: record({ db: record({ host: leaf("h"), port: leaf("1") }) }),
    })
  })

  it("writes lists as sequences", () => {
    expect(write(list("ports", int()), [1, 2])).toEqual({
      success: true,
      tree: record({ ports: sequence([leaf("1"), leaf("2")]) }),
    })
  })

  it("writes nothing for an absent optional value", () => {
    expect(write(optional(int("port")), undefined)).toEqual({ success: true, tree: EMPTY })
    expect(write(zip(string("host"), optional(int("port"))), ["h", undefined])).toEqual({
      success: true,
      tree: record({ host: leaf("h") }),
    })
  })

  it("writes the given value, not the default", () => {
    expect(write(withDefault(int("port"), 1), 5)).toEqual({
      success: true,
      tree: record({ port: leaf("5") }),
    })
  })

  it("writes the chosen side of an either", () => {
    expect(write(orElseEither(int("a"), string("b")), right<string, number>("x"))).toEqual({
      success: true,
      tree: record({ b: leaf("x") }),
    })
  })

  it("fails when the backward conversion rejects the value", () => {
    const positive = refine(int("port"), (n) => n > 0, "must be positive")

    expect(write(nested("http", positive), -1)).toEqual({
      success: false,
      error: { path: ["http"], message: "must be positive" },
    })
  })

  it("throws when two descriptors write the same value", () => {
    const d = zip(int("port"), string("port"))

    expect(() => write(d, [1, "x"])).toThrow(DescriptorCollisionError)
    expect(() => write(d, [1, "x"])).toThrow("Two descriptors write the same value at port")
  })
})
