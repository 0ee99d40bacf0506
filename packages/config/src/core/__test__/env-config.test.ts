import { definePropertyKeys } from "../define-property-keys"
import { EnvConfigView, maskSecured } from "../env-config"
import { ConfigValueParseError } from "../errors"

const Keys = definePropertyKeys({
  enabled: { nameInFile: "feature.enabled", visibility: "PUBLIC" },
  port: { nameInFile: "port", visibility: "PUBLIC" },
  quota: { nameInFile: "quota", visibility: "PUBLIC" },
  region: { nameInFile: "region", defaultValue: "eu-1", visibility: "PUBLIC" },
  password: { nameInFile: "db.password", visibility: "SECURED" },
  token: { nameInFile: "api.token", defaultValue: "abc", visibility: "SECURED" },
  missing: { nameInFile: "missing", visibility: "PUBLIC" },
})

function viewWith(values: Record<string, string>) {
  const view = new EnvConfigView(Keys)
  const entries = Object.entries(values)

  view.replace({
    values: new Map(entries),
    provenance: new Map(entries.map(([k]) => [k, "properties:svc.properties"])),
    sourcesUsed: ["properties:svc.properties"],
    unknownKeys: [],
  })

  return view
}

describe("EnvConfigView", () => {
  it("lists the declared keys in declaration order", () => {
    expect(viewWith({}).propertyKeys()).toEqual([
      "enabled",
      "port",
      "quota",
      "region",
      "password",
      "token",
      "missing",
    ])
  })

  describe("getString", () => {
    it("prefers the loaded value over the default", () => {
      expect(viewWith({ region: "us-2" }).getString("region")).toBe("us-2")
    })

    it("falls back to the default, then to undefined", () => {
      const view = viewWith({})

      expect(view.getString("region")).toBe("eu-1")
      expect(view.getString("missing")).toBeUndefined()
    })
  })

  describe("getBoolean", () => {
    it.each([
      ["true", true],
      ["TRUE", true],
      ["False", false],
    ])("parses %s", (raw, expected) => {
      expect(viewWith({ "feature.enabled": raw }).getBoolean("enabled")).toBe(expected)
    })

    it("returns undefined when absent", () => {
      expect(viewWith({}).getBoolean("enabled")).toBeUndefined()
    })

    it.each(["yes", "1", ""])("throws for %j", (raw) => {
      expect(() => viewWith({ "feature.enabled": raw }).getBoolean("enabled")).toThrow(
        ConfigValueParseError,
      )
    })
  })

  describe("getInteger", () => {
    it.each([
      ["8080", 8080],
      ["+7", 7],
      ["-2147483648", -2147483648],
      ["2147483647", 2147483647],
      ["007", 7],
    ])("parses %s", (raw, expected) => {
      expect(viewWith({ port: raw }).getInteger("port")).toBe(expected)
    })

    it.each(["2147483648", "12.5", "1e3", "0x10", "eight", ""])("throws for %j", (raw) => {
      expect(() => viewWith({ port: raw }).getInteger("port")).toThrow(ConfigValueParseError)
    })

    it("reports the key, not the value", () => {
      expect(() => viewWith({ port: "eight" }).getInteger("port")).toThrow(
        "Property port is not a valid integer",
      )
    })
  })

  describe("getLong", () => {
    it.each([
      ["9223372036854775807", 9223372036854775807n],
      ["-9223372036854775808", -9223372036854775808n],
      ["42", 42n],
    ])("parses %s", (raw, expected) => {
      expect(viewWith({ quota: raw }).getLong("quota")).toBe(expected)
    })

    it.each(["9223372036854775808", "1.0", "many"])("throws for %j", (raw) => {
      expect(() => viewWith({ quota: raw }).getLong("quota")).toThrow(ConfigValueParseError)
    })

    it("returns undefined when absent", () => {
      expect(viewWith({}).getLong("quota")).toBeUndefined()
    })
  })

  describe("display", () => {
    it("masks every even-indexed character of secured values", () => {
      expect(maskSecured("password")).toBe("#a#s#o#d")
      expect(maskSecured("x")).toBe("#")
      expect(viewWith({ "db.password": "password" }).getValueForDisplay("password")).toBe(
        "#a#s#o#d",
      )
    })

    it("leaves public, empty and absent values alone", () => {
      const view = viewWith({ region: "us-2", "db.password": "" })

      expect(view.getValueForDisplay("region")).toBe("us-2")
      expect(view.getValueForDisplay("password")).toBe("")
      expect(view.getValueForDisplay("missing")).toBeUndefined()
    })

    it("lists present and defaulted keys sorted by name", () => {
      const view = viewWith({ port: "8080", "db.password": "password" })

      expect([...view.getValuesForDisplay()]).toEqual([
        ["api.token", "#b#"],
        ["db.password", "#a#s#o#d"],
        ["port", "8080"],
        ["region", "eu-1"],
      ])
    })
  })

  describe("provenance", () => {
    it("explains loaded, defaulted and unset keys", () => {
      const view = viewWith({ port: "8080" })

      expect(view.explain("port")).toBe("properties:svc.properties")
      expect(view.explain("region")).toBe("default")
      expect(view.explain("missing")).toBe("unset")
      expect(view.sourcesUsed()).toEqual(["properties:svc.properties"])
    })
  })

  it("reads nothing before the first snapshot", () => {
    const view = new EnvConfigView(Keys)

    expect(view.getString("port")).toBeUndefined()
    expect(view.unknownKeys()).toEqual([])
  })
})
