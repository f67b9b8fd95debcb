import {
  arg,
  buildDocument,
  int,
  type NodeSpec,
  node,
  prop,
  str,
} from "../../../tests/utils/document-builder"
import { nth } from "../../../tests/utils/nth"
import { diagnosticOf } from "../../../tests/utils/parse-text"
import { SocketAddress } from "../../scalars/socket-address"
import { ParseContext } from "../parse-context"
import { namePredicate, Rules } from "../rules"

const ctxOf = (def: NodeSpec) =>
  nth(ParseContext.root(buildDocument([def]), "test.kdl").nodes(), 0)

describe("Rules", () => {
  it("passes an empty rule list", () => {
    expect(() => ctxOf(node("n", [arg(int(1))], [])).validate([])).not.toThrow()
  })

  describe("noChildren", () => {
    it("rejects a children block, even an empty one", () => {
      const diag = diagnosticOf(() => ctxOf(node("filter", [], [])).validate([Rules.noChildren]))

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Directive 'filter' does not accept a children block")
    })

    it("accepts a node without one", () => {
      expect(() => ctxOf(node("filter")).validate([Rules.noChildren])).not.toThrow()
    })
  })

  describe("noPositionalArgs", () => {
    it("points at the first positional entry", () => {
      const ctx = ctxOf(node("filter", [prop("name", str("a")), arg(int(1))]))
      const diag = diagnosticOf(() => ctx.validate([Rules.noPositionalArgs]))

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe(
        "Directive 'filter' does not accept positional arguments, found Integer(1)",
      )
      expect(diag.span).toEqual(nth(ctx.args(), 1).span)
    })

    it("accepts named entries only", () => {
      const ctx = ctxOf(node("filter", [prop("name", str("a"))]))

      expect(() => ctx.validate([Rules.noPositionalArgs])).not.toThrow()
    })
  })

  describe("maxPositionalArgs", () => {
    it("points at the first extra argument", () => {
      const ctx = ctxOf(node("key", [arg(str("a")), prop("fallback", str("f")), arg(str("b"))]))
      const diag = diagnosticOf(() => ctx.validate([Rules.maxPositionalArgs(1)]))

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe(
        `Directive 'key' accepts at most 1 positional argument(s), found String("b")`,
      )
      expect(diag.span).toEqual(nth(ctx.args(), 2).span)
    })

    it("accepts up to the limit", () => {
      const ctx = ctxOf(node("key", [arg(str("a")), prop("fallback", str("f"))]))

      expect(() => ctx.validate([Rules.maxPositionalArgs(1)])).not.toThrow()
    })
  })

  describe("onlyKeysTyped", () => {
    const rule = Rules.onlyKeysTyped([
      ["cert-path", "string"],
      ["offer-h2", "boolean"],
    ])

    it("rejects keys outside the list", () => {
      const ctx = ctxOf(node("l", [prop("cert", str("x"))]))
      const diag = diagnosticOf(() => ctx.validate([rule]))

      expect(diag.code).toBe("unknown_key")
      expect(diag.message).toBe(
        `Unknown configuration key: 'cert'. Allowed keys are: ["cert-path", "offer-h2"]`,
      )
    })

    it("rejects values of the wrong kind", () => {
      const ctx = ctxOf(node("l", [prop("cert-path", str("x")), prop("offer-h2", str("yes"))]))
      const diag = diagnosticOf(() => ctx.validate([rule]))

      expect(diag.code).toBe("type_mismatch")
      expect(diag.message).toBe(`Key 'offer-h2' expects a Boolean, found String("yes")`)
      expect(diag.span).toEqual(nth(ctx.args(), 1).span)
    })

    it("ignores positional entries and absent keys", () => {
      const ctx = ctxOf(node("l", [arg(int(5)), prop("cert-path", str("x"))]))

      expect(() => ctx.validate([rule])).not.toThrow()
    })

    it("with an empty list rejects every key", () => {
      const ctx = ctxOf(node("services", [prop("mode", str("x"))]))

      expect(diagnosticOf(() => ctx.validate([Rules.onlyKeysTyped([])])).message).toBe(
        "Unknown configuration key: 'mode'. Allowed keys are: []",
      )
    })
  })

  describe("name", () => {
    const rule = Rules.name(namePredicate(SocketAddress.type))

    it("accepts a node name satisfying the predicate", () => {
      expect(() => ctxOf(node("127.0.0.1:8080")).validate([rule])).not.toThrow()
    })

    it("rejects other names", () => {
      const diag = diagnosticOf(() => ctxOf(node("localhost")).validate([rule]))

      expect(diag.code).toBe("format")
      expect(diag.message).toBe("Invalid node name 'localhost': expected a valid SocketAddr")
    })
  })

  it("reports the first failing rule in order", () => {
    const ctx = ctxOf(node("filter", [arg(int(1))], []))

    expect(diagnosticOf(() => ctx.validate([Rules.noPositionalArgs, Rules.noChildren])).message)
      .toBe("Directive 'filter' does not accept positional arguments, found Integer(1)")
    expect(diagnosticOf(() => ctx.validate([Rules.noChildren, Rules.noPositionalArgs])).message)
      .toBe("Directive 'filter' does not accept a children block")
  })
})
