import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-03-02T08:15:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes every field", () => {
      const err = new BaseError("Invalid FQDN 'a b'", {
        code: "format",
        context: { sourceName: "chain.kdl", line: 2 },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "format",
        message: "Invalid FQDN 'a b'",
        context: { sourceName: "chain.kdl", line: 2 },
        isOperational: false,
        timestamp: "2026-03-02T08:15:00.000Z",
      })
    })

    it("omits stack unless requested", () => {
      const err = new BaseError("test", { code: "structural" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits stack when it is empty", () => {
      const err = new BaseError("test", { code: "structural" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain", () => {
      const root = new Error("EACCES: permission denied")
      const middle = new BaseError("cannot read proxy.kdl", {
        code: "source_unreadable",
        cause: root,
      })
      const outer = new BaseError("load failed", { code: "load_failed", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("source_unreadable")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("EACCES: permission denied")
    })

    it("omits cause when there is none", () => {
      const err = new BaseError("no cause", { code: "structural" })

      expect("cause" in serializeError(err)).toBe(false)
    })
  })

  describe("plain Error instances", () => {
    it("uses code unknown and marks them non-operational", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized.code).toBe("unknown")
      expect(serialized.name).toBe("TypeError")
      expect(serialized.isOperational).toBe(false)
    })

    it("follows Error.cause", () => {
      const err = new Error("wrapper", { cause: new Error("root") })

      expect(serializeError(err).cause?.message).toBe("root")
    })
  })

  describe("non-Error values", () => {
    it("uses a thrown string as the message", () => {
      const serialized = serializeError("bad config")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("bad config")
    })

    it("keeps other values in context", () => {
      const thrown = { path: "proxy.kdl" }

      const serialized = serializeError(thrown)

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: thrown })
    })

    it("handles null", () => {
      expect(serializeError(null).context).toEqual({ value: null })
    })
  })
})
