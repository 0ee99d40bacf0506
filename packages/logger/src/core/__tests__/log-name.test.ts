import { currentLogName, runWithLogName } from "../log-name"

describe("runWithLogName", () => {
  it("has no name outside a scope", () => {
    expect(currentLogName()).toBeUndefined()
  })

  it("exposes the name inside the scope and returns fn's result", () => {
    const result = runWithLogName("telemetry", () => currentLogName())

    expect(result).toBe("telemetry")
    expect(currentLogName()).toBeUndefined()
  })

  it("keeps the name across awaits", async () => {
    const seen = await runWithLogName("alerts", async () => {
      await new Promise((resolve) => setTimeout(resolve, 1))
      return currentLogName()
    })

    expect(seen).toBe("alerts")
  })

  it("nested scopes shadow and restore", () => {
    const seen: Array<string | undefined> = []

    runWithLogName("outer", () => {
      runWithLogName("inner", () => seen.push(currentLogName()))
      seen.push(currentLogName())
    })

    expect(seen).toEqual(["inner", "outer"])
  })

  it("an empty name clears the current one", () => {
    const seen = runWithLogName("outer", () => runWithLogName("", () => currentLogName()))

    expect(seen).toBeUndefined()
  })
})
