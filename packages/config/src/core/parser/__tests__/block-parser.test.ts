import { arg, buildDocument, node, prop, str } from "../../../tests/utils/document-builder"
import { nth } from "../../../tests/utils/nth"
import { diagnosticOf } from "../../../tests/utils/parse-text"
import { BlockParser } from "../block-parser"
import { ParseContext } from "../parse-context"

/*
 * filter name="a"
 * key "k1"
 * filter name="b"
 * other
 */
const document = buildDocument([
  node("filter", [prop("name", str("a"))]),
  node("key", [arg(str("k1"))]),
  node("filter", [prop("name", str("b"))]),
  node("other"),
])

const root = () => ParseContext.root(document, "test.kdl")
const filterName = (c: ParseContext) => c.prop("name").asStr()

describe("BlockParser", () => {
  it("consumes every directive and exhausts cleanly", () => {
    const block = BlockParser.from(root())

    const key = block.required("key", (c) => c.arg(0).asStr())
    const filters = block.repeated("filter", filterName)
    const other = block.optional("other", (c) => c.name())

    expect(() => block.exhaust()).not.toThrow()
    expect(key).toBe("k1")
    expect(filters).toEqual(["a", "b"])
    expect(other).toBe("other")
  })

  it("reports the first unconsumed directive at exhaust()", () => {
    const block = BlockParser.from(root())

    block.repeated("filter", filterName)

    const diag = diagnosticOf(() => block.exhaust())

    expect(diag.code).toBe("unknown_directive")
    expect(diag.message).toBe("Unknown directive: 'key'")
    expect(diag.line).toBe(2)
    expect(diag.span).toEqual(nth(document.root.nodes, 1).span)
  })

  it("required() names the missing directive", () => {
    const block = BlockParser.from(root())
    const diag = diagnosticOf(() => block.required("algorithm", (c) => c.name()))

    expect(diag.code).toBe("missing_required")
    expect(diag.message).toBe("Missing required directive 'algorithm'")
  })

  it("leaves other directives available after a failed required()", () => {
    const block = BlockParser.from(root())

    diagnosticOf(() => block.required("algorithm", (c) => c.name()))

    expect(block.remaining()).toEqual(["filter", "key", "filter", "other"])
    expect(block.repeated("filter", filterName)).toEqual(["a", "b"])
  })

  it("required() takes the first match and leaves duplicates pending", () => {
    const block = BlockParser.from(root())

    expect(block.required("filter", filterName)).toBe("a")
    expect(block.remaining()).toEqual(["key", "filter", "other"])
  })

  it("optional() returns undefined when absent", () => {
    expect(BlockParser.from(root()).optional("algorithm", (c) => c.name())).toBeUndefined()
  })

  it("repeated() returns an empty list when absent", () => {
    expect(BlockParser.from(root()).repeated("upstream", (c) => c.name())).toEqual([])
  })

  it("propagates failures from the extractor", () => {
    const block = BlockParser.from(root())
    const diag = diagnosticOf(() => block.required("key", (c) => c.prop("fallback").asStr()))

    expect(diag.message).toBe("Missing required property 'fallback'")
  })

  it("rejects any use after exhaust()", () => {
    const block = BlockParser.from(root())

    block.repeated("filter", filterName)
    block.required("key", (c) => c.name())
    block.optional("other", (c) => c.name())
    block.exhaust()

    for (const call of [
      () => block.required("key", (c) => c.name()),
      () => block.optional("key", (c) => c.name()),
      () => block.repeated("key", (c) => c.name()),
      () => block.exhaust(),
    ]) {
      const diag = diagnosticOf(call)

      expect(diag.code).toBe("structural")
      expect(diag.message).toBe("Block parser used after exhaust()")
    }
  })

  it("works from a node with a children block", () => {
    const ctx = nth(
      ParseContext.root(buildDocument([node("chain", [], [node("filter")])]), "test.kdl").nodes(),
      0,
    )
    const block = BlockParser.from(ctx)

    expect(block.remaining()).toEqual(["filter"])
  })

  it("fails to start on a node without children", () => {
    const leaf = nth(root().nodes(), 3)
    const diag = diagnosticOf(() => BlockParser.from(leaf))

    expect(diag.code).toBe("structural")
    expect(diag.message).toBe("Expected children block")
  })
})
