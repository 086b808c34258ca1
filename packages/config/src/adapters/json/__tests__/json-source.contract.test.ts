import fs from "node:fs/promises"
import path from "node:path"
import { describeSourceLoaderContract } from "../../../ports/__tests__/source-loader.contract"
import { JsonSource } from "../json-source"

describeSourceLoaderContract({
  name: "JsonSource",
  make: async (cwd) => ({
    loader: new JsonSource({ file: "config.json", required: true, cwd }),
  }),
  setup: async (cwd) => {
    await fs.writeFile(
      path.join(cwd, "config.json"),
      JSON.stringify({ test: { key: "test_value" } }),
    )
  },
  expected: { path: ["test", "key"], value: "test_value" },
  expectedKeys: ["test.key"],
})
