import {
  arg,
  bool,
  buildDocument,
  float,
  int,
  nil,
  node,
  prop,
  str,
} from "../../../tests/utils/document-builder"
import { nth } from "../../../tests/utils/nth"
import { diagnosticOf } from "../../../tests/utils/parse-text"
import { SocketAddress } from "../../scalars/socket-address"
import { ParseContext } from "../parse-context"

/*
 * listeners {
 *   "0.0.0.0:80"
 * }
 * leaf "a" k=1 k=2 flag=#true ratio=1.5
 * empty {
 * }
 */
const document = buildDocument([
  node("listeners", [], [node("0.0.0.0:80")]),
  node("leaf", [
    arg(str("a")),
    prop("k", int(1)),
    prop("k", int(2)),
    prop("flag", bool(true)),
    prop("ratio", float(1.5)),
  ]),
  node("empty", [], []),
])

const root = () => ParseContext.root(document, "test.kdl")
const child = (index: number) => nth(root().nodes(), index)

describe("ParseContext", () => {
  describe("focus", () => {
    it("starts at the document", () => {
      expect(root().focus.kind).toBe("document")
      expect(root().sourceName).toBe("test.kdl")
    })

    it("rejects node accessors on the document", () => {
      const diag = diagnosticOf(() => root().name())

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Expected node, but current is a document")
      expect(diagnosticOf(() => root().args()).message).toBe(
        "Expected node, but current is a document",
      )
    })

    it("forNode() keeps the document and source name", () => {
      const leafNode = nth(document.root.nodes, 1)
      const ctx = root().forNode(leafNode)

      expect(ctx.name()).toBe("leaf")
      expect(ctx.document).toBe(document)
      expect(ctx.sourceName).toBe("test.kdl")
    })
  })

  describe("enterBlock", () => {
    it("moves from a node to its children", () => {
      const block = child(0).enterBlock()

      expect(block.focus.kind).toBe("document")
      expect(block.nodes().map((c) => c.name())).toEqual(["0.0.0.0:80"])
    })

    it("fails on a node without children", () => {
      const diag = diagnosticOf(() => child(1).enterBlock())

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Expected a children block { ... }, but none found")
    })

    it("fails on the document root", () => {
      expect(diagnosticOf(() => root().enterBlock()).message).toBe(
        "Cannot enter block: current context is already a document root",
      )
    })
  })

  describe("nodes", () => {
    it("lists top-level nodes in order", () => {
      expect(root().nodes().map((c) => c.name())).toEqual(["listeners", "leaf", "empty"])
    })

    it("fails when the node has no children block", () => {
      const diag = diagnosticOf(() => child(1).nodes())

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Expected children block")
    })

    it("returns an empty list for an empty block", () => {
      expect(child(2).nodes()).toEqual([])
      expect(child(2).hasChildrenBlock()).toBe(true)
      expect(child(1).hasChildrenBlock()).toBe(false)
    })

    it("reqNodes() rejects an empty block by name", () => {
      const diag = diagnosticOf(() => child(2).reqNodes())

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Block 'empty' cannot be empty")
    })

    it("reqNodes() rejects an empty document", () => {
      const empty = ParseContext.root(buildDocument([]), "empty.kdl")

      expect(diagnosticOf(() => empty.reqNodes()).message).toBe("Block cannot be empty")
    })
  })

  describe("expectName", () => {
    it("accepts the expected name", () => {
      expect(() => child(1).expectName("leaf")).not.toThrow()
    })

    it("names both sides on mismatch", () => {
      const diag = diagnosticOf(() => child(1).expectName("listeners"))

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Expected 'listeners', found 'leaf'")
    })
  })

  describe("argsMap", () => {
    it("maps named entries to text, first duplicate wins", () => {
      expect([...child(1).argsMap()]).toEqual([
        ["k", "1"],
        ["flag", "true"],
        ["ratio", "1.5"],
      ])
    })

    it("limits to the given range", () => {
      expect([...child(1).argsMap({ start: 2, end: 4 })]).toEqual([
        ["k", "2"],
        ["flag", "true"],
      ])
    })

    it("rejects a range past the entries", () => {
      const diag = diagnosticOf(() => child(1).argsMap({ start: 6 }))

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Range out of bounds")
    })

    it("rejects a reversed range", () => {
      expect(diagnosticOf(() => child(1).argsMap({ start: 3, end: 2 })).message).toBe(
        "Range out of bounds",
      )
    })

    it("skips entries set to null", () => {
      const doc = buildDocument([
        node("filter", [prop("name", str("com.example.a")), prop("opt", nil()), prop("level", int(3))]),
      ])
      const ctx = nth(ParseContext.root(doc, "test.kdl").nodes(), 0)

      expect([...ctx.argsMap()]).toEqual([
        ["name", "com.example.a"],
        ["level", "3"],
      ])
    })

    it("accepts an empty range at the end", () => {
      expect(child(1).argsMap({ start: 5 }).size).toBe(0)
    })
  })

  describe("argsMapWithOnlyKeys", () => {
    it("passes when every key is allowed", () => {
      const map = child(1).argsMapWithOnlyKeys({}, ["k", "flag", "ratio"])

      expect(map.get("ratio")).toBe("1.5")
    })

    it("reports the first key outside the allow-list", () => {
      const diag = diagnosticOf(() => child(1).argsMapWithOnlyKeys({}, ["k", "ratio"]))

      expect(diag.code).toBe("unknown_key")
      expect(diag.message).toBe(
        `Unknown configuration key: 'flag'. Allowed keys are: ["k", "ratio"]`,
      )
    })
  })

  describe("properties", () => {
    it("prop() returns the first entry with the key", () => {
      expect(child(1).prop("k").asUsize()).toBe(1)
    })

    it("prop() fails on a missing key", () => {
      const diag = diagnosticOf(() => child(1).prop("missing"))

      expect(diag.code).toBe("missing_required")
      expect(diag.message).toBe("Missing required property 'missing'")
    })

    it("optProp() returns undefined on a missing key", () => {
      expect(child(1).optProp("missing")).toBeUndefined()
    })

    it("props() keeps the order of the keys", () => {
      const [flag, missing, k] = child(1).props(["flag", "missing", "k"])

      expect(flag?.asBool()).toBe(true)
      expect(missing).toBeUndefined()
      expect(k?.asUsize()).toBe(1)
    })
  })

  describe("positional arguments", () => {
    const mixed = () =>
      ParseContext.root(
        buildDocument([node("n", [prop("key", str("x")), arg(str("p"))]), node("bare")]),
        "test.kdl",
      ).nodes()

    it("first() returns the first entry of any kind", () => {
      expect(nth(mixed(), 0).first().asStr()).toBe("x")
    })

    it("arg() skips named entries", () => {
      expect(nth(mixed(), 0).arg(0).asStr()).toBe("p")
    })

    it("first() fails without entries", () => {
      const diag = diagnosticOf(() => nth(mixed(), 1).first())

      expect(diag.code).toBe("missing_required")
      expect(diag.message).toBe("Missing required first argument")
    })

    it("arg() reports the 1-based position", () => {
      const diag = diagnosticOf(() => nth(mixed(), 0).arg(1))

      expect(diag.code).toBe("missing_required")
      expect(diag.message).toBe("Missing required argument at position 2")
    })
  })

  describe("parseName", () => {
    it("parses the node name with a scalar type", () => {
      const listener = nth(child(0).nodes(), 0)

      expect(listener.parseName(SocketAddress.type).toString()).toBe("0.0.0.0:80")
    })

    it("reports a format error with the type name", () => {
      const diag = diagnosticOf(() => child(1).parseName(SocketAddress.type))

      expect(diag.code).toBe("format")
      expect(diag.message).toBe("Invalid SocketAddr 'leaf'. Reason: missing port")
    })
  })

  describe("errors", () => {
    it("error() points at the node", () => {
      const diag = child(1).error("boom", "format")

      expect(diag.sourceName).toBe("test.kdl")
      expect(diag.line).toBe(4)
      expect(diag.column).toBe(1)
      expect(diag.span).toEqual(nth(document.root.nodes, 1).span)
    })

    it("error() on the document points at the whole text", () => {
      expect(root().error("boom", "structural").span).toEqual({
        offset: 0,
        length: document.text.length,
      })
    })

    it("errorWithSpan() points at the given span", () => {
      const leaf = child(1)
      const entry = nth(leaf.args(), 1)
      const diag = leaf.errorWithSpan("bad", entry.span, "type_mismatch")

      expect(diag.line).toBe(4)
      expect(diag.column).toBe(10)
      expect(diag.help.split("\n")[4]).toBe("  |          ^^^")
    })
  })
})
