import { leaf, sequence } from "../../../core/tree"
import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  it("maps nested objects and arrays", async () => {
    const { source, keys } = await new ObjectSource({
      db: { port: 5432, replicas: ["r1", "r2"] },
      debug: false,
      unset: null,
    }).load()

    expect(source.getValue(["db", "port"])).toEqual(leaf("5432"))
    expect(source.getValue(["db", "replicas"])).toEqual(sequence([leaf("r1"), leaf("r2")]))
    expect(source.getValue(["debug"])).toEqual(leaf("false"))
    expect(keys).toEqual(["db.port", "db.replicas", "debug"])
  })

  it("takes a custom name", () => {
    expect(new ObjectSource({}, "object:test").name).toBe("object:test")
    expect(new ObjectSource({}).name).toBe("object:overrides")
  })
})
