import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { PropertiesFileSource } from "../properties-file-source"

describeConfigSourceContract({
  name: "PropertiesFileSource",
  make: async (cwd) => ({
    source: new PropertiesFileSource({
      fileName: "devices.properties",
      location: { kind: "directory", path: cwd },
      required: true,
    }),
  }),
  setup: async (cwd) => {
    await fs.writeFile(path.join(cwd, "devices.properties"), "broker.url=tcp://localhost:1883\n")
  },
  expectedValue: () => ({ "broker.url": "tcp://localhost:1883" }),
})
