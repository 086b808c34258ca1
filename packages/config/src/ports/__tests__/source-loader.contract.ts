import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { EMPTY, leaf } from "../../core/tree"
import type { SourceLoader } from "../source"

export type SourceLoaderHarness = {
  name: string
  make: (cwd: string) => Promise<{
    loader: SourceLoader
    cleanup?: () => Promise<void>
  }>
  setup: (cwd: string) => Promise<void>
  /** A path the loaded source must answer, and the leaf value expected there */
  expected: { path: readonly string[]; value: string }
  expectedKeys: readonly string[]
}

export function describeSourceLoaderContract(h: SourceLoaderHarness) {
  describe(`${h.name} (SourceLoader contract)`, () => {
    let cwd: string
    let loader: SourceLoader
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"))
      await h.setup(cwd)
      const result = await h.make(cwd)

      loader = result.loader
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a name", () => {
      expect(typeof loader.name).toBe("string")
      expect(loader.name.length).toBeGreaterThan(0)
    })

    it("load() answers the expected path", async () => {
      const { source } = await loader.load()

      expect(source.getValue(h.expected.path)).toEqual(leaf(h.expected.value))
    })

    it("load() names the answers after the loader", async () => {
      const { source } = await loader.load()

      expect(source.resolve(h.expected.path).names).toEqual([loader.name])
    })

    it("load() lists the keys it provides", async () => {
      const { keys } = await loader.load()

      expect(keys).toEqual(h.expectedKeys)
    })

    it("load() resolves missing paths to Empty", async () => {
      const { source } = await loader.load()

      expect(source.getValue(["__CONFIG_TEST_MISSING__"])).toEqual(EMPTY)
    })

    it("load() is idempotent", async () => {
      const a = await loader.load()
      const b = await loader.load()

      expect(b.keys).toEqual(a.keys)
      expect(b.source.getValue(h.expected.path)).toEqual(a.source.getValue(h.expected.path))
    })
  })
}
