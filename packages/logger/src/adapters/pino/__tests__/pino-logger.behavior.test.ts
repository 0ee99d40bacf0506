import { Writable } from "node:stream"
import { BaseError } from "@devicekit/errors"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "fleet" })

    logger.info("hello", { worker: "ingest-1" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload).toMatchObject({
      msg: "hello",
      level: 30,
      service: "fleet",
      worker: "ingest-1",
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "fleet" })
    const child = base.child({ module: "executor" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      msg: "logged",
      service: "fleet",
      module: "executor",
    })
  })

  it("serializes err with its code and cause", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const err = new BaseError("Task failed", {
      code: "task_failed",
      cause: new Error("socket closed"),
    })
    logger.error("task fault", { err })

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload.err).toMatchObject({
      type: "BaseError",
      message: "Task failed",
      code: "task_failed",
      cause: { type: "Error", message: "socket closed" },
    })
  })
})
