import { BaseError } from "@treeconf/errors"
import { z } from "zod"
import { LeafForSequence } from "../../ports/source"
import {
  combine,
  from,
  int,
  list,
  nested,
  optional,
  orElse,
  orElseEither,
  refine,
  schemaValue,
  string,
  transform,
  withDefault,
  withDescription,
  zip,
} from "../descriptor"
import { fromMap, fromMultiMap } from "../from-map"
import { read, valuePaths } from "../read"
import { emptySource, fromFunction, fromTree } from "../source"
import { leaf, record, sequence } from "../tree"

const server = combine(
  string("host"),
  int("port"),
  (host, port) => ({ host, port }),
  (s) => [s.host, s.port] as const,
)

const broken = fromFunction("broken", () => {
  throw new Error("disk on fire")
})

describe("read", () => {
  describe("values", () => {
    it("converts a leaf and records where it came from", () => {
      expect(read(int("port"), fromMap({ port: "8080" }))).toEqual({
        success: true,
        value: 8080,
        origins: [{ path: ["port"], sources: ["constant"] }],
      })
    })

    it("reads the current path when the value has no key", () => {
      expect(read(string(), fromTree(leaf("x"), "t"))).toEqual({
        success: true,
        value: "x",
        origins: [{ path: [], sources: ["t"] }],
      })
    })

    it("reports a missing value with its path", () => {
      expect(read(int("port"), fromMap({}))).toEqual({
        success: false,
        error: { kind: "missing-value", path: ["port"] },
      })
    })

    it("reports a failed conversion with the raw text", () => {
      expect(read(int("port"), fromMap({ port: "not-a-number" }))).toEqual({
        success: false,
        error: {
          kind: "conversion",
          path: ["port"],
          raw: "not-a-number",
          expected: "int",
          message: "expected an integer",
        },
      })
    })

    it("takes the first value of a list", () => {
      expect(read(string("user"), fromMultiMap({ user: ["k1", "k2"] }))).toMatchObject({
        success: true,
        value: "k1",
      })
    })

    it("rejects a record where a value is expected", () => {
      expect(read(string("db"), fromMap({ "db.port": "1" }, { keyDelimiter: "." }))).toEqual({
        success: false,
        error: { kind: "format", path: ["db"], message: "expected a value, found a record" },
      })
    })

    it("reads through any zod schema", () => {
      const level = schemaValue(
        "level",
        "log level",
        z.string().pipe(z.enum(["debug", "info"])),
        String,
      )

      expect(read(level, fromMap({ level: "info" }))).toMatchObject({ success: true, value: "info" })
      expect(read(level, fromMap({ level: "loud" }))).toMatchObject({
        success: false,
        error: { kind: "conversion", path: ["level"], raw: "loud", expected: "log level" },
      })
    })

    it("turns a throwing source into a source error", () => {
      expect(read(int("a"), broken)).toEqual({
        success: false,
        error: { kind: "source", path: ["a"], message: "disk on fire", code: "config_source_failed" },
      })
    })

    it("keeps the code of an application error thrown by a source", () => {
      const source = fromFunction("vault", () => {
        throw new BaseError("sealed", { code: "vault_sealed" })
      })

      expect(read(int("a"), source)).toMatchObject({
        success: false,
        error: { kind: "source", code: "vault_sealed", message: "sealed" },
      })
    })
  })

  describe("nested", () => {
    it("descends into a record", () => {
      const source = fromMap({ "db.port": "5432" }, { keyDelimiter: "." })

      expect(read(nested("db", int("port")), source)).toEqual({
        success: true,
        value: 5432,
        origins: [{ path: ["db", "port"], sources: ["constant"] }],
      })
    })
  })

  describe("zip", () => {
    it("joins both values", () => {
      expect(read(server, fromMap({ host: "h", port: "1" }))).toMatchObject({
        success: true,
        value: { host: "h", port: 1 },
      })
    })

    it("reports both failures", () => {
      expect(read(zip(int("a"), int("b")), fromMap({ a: "x" }))).toEqual({
        success: false,
        error: {
          kind: "zip",
          errors: [
            { kind: "conversion", path: ["a"], raw: "x", expected: "int", message: "expected an integer" },
            { kind: "missing-value", path: ["b"] },
          ],
        },
      })
    })

    it("flattens nested zips into one list", () => {
      expect(read(zip(zip(int("a"), int("b")), int("c")), emptySource)).toEqual({
        success: false,
        error: {
          kind: "zip",
          errors: [
            { kind: "missing-value", path: ["a"] },
            { kind: "missing-value", path: ["b"] },
            { kind: "missing-value", path: ["c"] },
          ],
        },
      })
    })
  })

  describe("orElseEither", () => {
    const portOrName = orElseEither(int("port"), string("port"))

    it("prefers the left descriptor", () => {
      expect(read(portOrName, fromMap({ port: "80" }))).toMatchObject({
        success: true,
        value: { kind: "left", value: 80 },
      })
    })

    it("falls back to the right descriptor", () => {
      expect(read(portOrName, fromMap({ port: "http" }))).toMatchObject({
        success: true,
        value: { kind: "right", value: "http" },
      })
    })

    it("reports both failures when neither side reads", () => {
      expect(read(orElseEither(int("a"), int("b")), emptySource)).toEqual({
        success: false,
        error: {
          kind: "or-else",
          errors: [
            { kind: "missing-value", path: ["a"] },
            { kind: "missing-value", path: ["b"] },
          ],
        },
      })
    })

    it("does not try the right descriptor after a source failure", () => {
      const fallback = from(int("a"), fromMap({ a: "1" }))

      expect(read(orElseEither(int("a"), fallback), broken)).toEqual({
        success: false,
        error: { kind: "source", path: ["a"], message: "disk on fire", code: "config_source_failed" },
      })
    })

    it("orElse reads either key into one type", () => {
      expect(read(orElse(int("PORT"), int("port")), fromMap({ port: "1" }))).toMatchObject({
        success: true,
        value: 1,
      })
    })
  })

  describe("sequences", () => {
    it("reads every element with an indexed path", () => {
      const tree = record({
        servers: sequence([
          record({ host: leaf("a"), port: leaf("1") }),
          record({ host: leaf("b"), port: leaf("2") }),
        ]),
      })

      expect(read(list("servers", server), fromTree(tree, "t"))).toEqual({
        success: true,
        value: [
          { host: "a", port: 1 },
          { host: "b", port: 2 },
        ],
        origins: [
          { path: ["servers", 0, "host"], sources: ["t"] },
          { path: ["servers", 0, "port"], sources: ["t"] },
          { path: ["servers", 1, "host"], sources: ["t"] },
          { path: ["servers", 1, "port"], sources: ["t"] },
        ],
      })
    })

    it("maps keys inside list elements through convertKeys", () => {
      const source = fromTree(
        record({ SERVERS: sequence([record({ HOST: leaf("a") }), record({ HOST: leaf("b") })]) }),
        "env",
      ).convertKeys((key) => key.toUpperCase())

      expect(read(list("servers", string("host")), source)).toEqual({
        success: true,
        value: ["a", "b"],
        origins: [
          { path: ["servers", 0, "host"], sources: ["env"] },
          { path: ["servers", 1, "host"], sources: ["env"] },
        ],
      })
    })

    it("accepts a single value as a one-element list where the source allows it", () => {
      expect(read(list("tags", string()), fromMap({ tags: "x" }))).toMatchObject({
        success: true,
        value: ["x"],
      })
    })

    it("rejects a single value where the source does not allow it", () => {
      const source = fromMap({ tags: "x" }, { leafForSequence: LeafForSequence.Invalid })

      expect(read(list("tags", string()), source)).toEqual({
        success: false,
        error: { kind: "format", path: ["tags"], message: "expected a list, found a single value" },
      })
    })

    it("stops at the first element that fails, reporting its index", () => {
      expect(read(list("ports", int()), fromMultiMap({ ports: ["1", "x"] }))).toEqual({
        success: false,
        error: {
          kind: "conversion",
          path: ["ports", 1],
          raw: "x",
          expected: "int",
          message: "expected an integer",
        },
      })
    })

    it("reads an empty list", () => {
      expect(read(list("ports", int()), fromTree(record({ ports: sequence([]) }), "t"))).toEqual({
        success: true,
        value: [],
        origins: [],
      })
    })

    it("reports a missing list", () => {
      expect(read(list("ports", int()), emptySource)).toEqual({
        success: false,
        error: { kind: "missing-value", path: ["ports"] },
      })
    })
  })

  describe("optional", () => {
    it("is undefined when nothing is present", () => {
      expect(read(optional(int("port")), fromMap({}))).toEqual({
        success: true,
        value: undefined,
        origins: [],
      })
    })

    it("fails on a present but invalid value", () => {
      expect(read(optional(int("port")), fromMap({ port: "x" }))).toMatchObject({
        success: false,
        error: { kind: "conversion", path: ["port"] },
      })
    })

    it("fails when a group is only partly present", () => {
      expect(read(optional(server), fromMap({ host: "h" }))).toEqual({
        success: false,
        error: { kind: "missing-value", path: ["port"] },
      })
    })

    it("reports a failing source instead of treating it as absence", () => {
      expect(read(optional(int("a")), broken)).toMatchObject({
        success: false,
        error: { kind: "source" },
      })
    })
  })

  describe("withDefault", () => {
    it("uses the fallback when the value is missing", () => {
      expect(read(withDefault(int("port"), 8080), emptySource)).toEqual({
        success: true,
        value: 8080,
        origins: [{ path: ["port"], sources: ["default"] }],
      })
    })

    it("prefers a present value", () => {
      expect(read(withDefault(int("port"), 8080), fromMap({ port: "1" }))).toMatchObject({
        success: true,
        value: 1,
      })
    })

    it("does not hide an invalid value", () => {
      expect(read(withDefault(int("port"), 8080), fromMap({ port: "x" }))).toMatchObject({
        success: false,
        error: { kind: "conversion", path: ["port"] },
      })
    })
  })

  describe("transform", () => {
    it("maps the read value", () => {
      const doubled = transform(
        int("port"),
        (n) => n * 2,
        (n) => n / 2,
      )

      expect(read(doubled, fromMap({ port: "4" }))).toMatchObject({ success: true, value: 8 })
    })

    it("reports a rejected value at the path it was read from", () => {
      const positive = refine(int("port"), (n) => n > 0, "must be positive")

      expect(read(positive, fromMap({ port: "-1" }))).toEqual({
        success: false,
        error: { kind: "conversion", path: ["port"], message: "must be positive" },
      })
    })

    it("reports a rejected group at the current path", () => {
      const distinct = refine(zip(int("a"), int("b")), ([a, b]) => a !== b, "must differ")

      const source = fromMap({ "pair.a": "1", "pair.b": "1" }, { keyDelimiter: "." })

      expect(read(nested("pair", distinct), source)).toEqual({
        success: false,
        error: { kind: "conversion", path: ["pair"], message: "must differ" },
      })
    })
  })

  describe("annotations", () => {
    it("reads through a description", () => {
      const d = withDescription(int("port"), "Listen port")

      expect(read(d, fromMap({ port: "1" }))).toMatchObject({
        success: true,
        value: 1,
      })
    })

    it("reads a sourced descriptor from its own source", () => {
      const d = zip(int("a"), from(int("b"), fromMap({ b: "2" }, { source: "pinned" })))

      expect(read(d, fromMap({ a: "1", b: "9" }))).toEqual({
        success: true,
        value: [1, 2],
        origins: [
          { path: ["a"], sources: ["constant"] },
          { path: ["b"], sources: ["pinned"] },
        ],
      })
    })
  })
})

describe("valuePaths", () => {
  it("lists the path of every value a descriptor reads", () => {
    const d = nested("db", zip(optional(string("host")), withDefault(list("ports", int()), [])))

    expect(valuePaths(d, [])).toEqual([
      ["db", "host"],
      ["db", "ports"],
    ])
  })
})
