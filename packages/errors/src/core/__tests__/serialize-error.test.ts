import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("Code has no character", {
        code: "unknown_code",
        category: "configuration",
        context: { code: 420 },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "unknown_code",
        category: "configuration",
        message: "Code has no character",
        context: { code: 420 },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("includes stack only when requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits stack property when stack is empty", () => {
      const err = new BaseError("test", { code: "test" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes cause chain recursively", () => {
      const root = new Error("root cause")
      const middle = new BaseError("middle", { code: "unknown_character", cause: root })
      const outer = new BaseError("outer", { code: "batch_item_failed", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("unknown_character")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("root cause")
    })

    it("omits cause property when undefined", () => {
      const err = new BaseError("no cause", { code: "test" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("serializes as an internal non-operational failure", () => {
      const serialized = serializeError(new Error("unexpected"))

      expect(serialized.code).toBe("unknown")
      expect(serialized.category).toBe("internal")
      expect(serialized.isOperational).toBe(false)
    })

    it("preserves error subclass name", () => {
      expect(serializeError(new TypeError("not a function")).name).toBe("TypeError")
    })

    it("handles Error with cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("wraps string as message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.message).toBe("something went wrong")
      expect(serialized.name).toBe("NonErrorThrown")
    })

    it("wraps object in context.value", () => {
      const obj = { group: "1a2" }

      const serialized = serializeError(obj)

      expect(serialized.context).toEqual({ value: obj })
      expect(serialized.message).toBe("Unknown error")
    })

    it("handles null", () => {
      const serialized = serializeError(null)

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.context).toEqual({ value: null })
    })
  })
})
