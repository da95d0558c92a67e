import { describe, it, expect } from "vitest"
import { ParseError } from "./errors"
import { formatEvent } from "./events"

describe("formatEvent", () => {
  it("should name structural events by type", () => {
    expect(formatEvent({ type: "object-start" })).toBe("object-start")
    expect(formatEvent({ type: "object-value" })).toBe("object-value")
    expect(formatEvent({ type: "array-end" })).toBe("array-end")
    expect(formatEvent({ type: "null" })).toBe("null")
  })

  it("should quote strings", () => {
    expect(formatEvent({ type: "string", value: 'say "hi"\n' })).toBe('string "say \\"hi\\"\\n"')
  })

  it("should show the number kind", () => {
    expect(formatEvent({ type: "number", kind: "integer", value: -3n })).toBe("number -3 (integer)")
    expect(formatEvent({ type: "number", kind: "float", value: 0.5 })).toBe("number 0.5 (float)")
  })

  it("should show booleans", () => {
    expect(formatEvent({ type: "boolean", value: false })).toBe("boolean false")
  })

  it("should include the error of a failed end", () => {
    const error = new ParseError("expected : but got 1", { kind: "structural", line: 3, position: 9 })

    expect(formatEvent({ type: "end" })).toBe("end")
    expect(formatEvent({ type: "end", error })).toBe("end ParseError: l:3 pos:9 msg:expected : but got 1")
  })
})

describe("ParseError", () => {
  it("should carry kind, location and cause", () => {
    const cause = new RangeError("out of range")
    const error = new ParseError("bad number", { kind: "numeric-format", line: 1, position: 4, cause })

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe("ParseError")
    expect(error.kind).toBe("numeric-format")
    expect(error.cause).toBe(cause)
    expect(error.message).toBe("bad number")
  })
})
