import type {
  ConfigDocument,
  DocumentBlock,
  DocumentEntry,
  DocumentNode,
  SourceSpan,
} from "../../ports/document"
import { ConfigDiagnostic, type DiagnosticKind } from "../diagnostics/config-diagnostic"
import { formatKeyList } from "./describe"
import { type Rule, validateRules } from "./rules"
import { formatParseFailure, type ScalarType } from "./scalar-type"
import { TypedValue } from "./typed-value"

export type Focus =
  | { readonly kind: "document"; readonly block: DocumentBlock }
  | { readonly kind: "node"; readonly node: DocumentNode }

/**
 * Sub-range of a node's entries. `end` is exclusive; both default to the
 * whole list.
 */
export type ArgRange = {
  readonly start?: number
  readonly end?: number
}

/**
 * Cursor over a parsed document: either a block of nodes (the document root
 * or a node's children) or a single node.
 *
 * Contexts only hold references into the document, so deriving one per node
 * is cheap. Every accessor throws a {@link ConfigDiagnostic} anchored at the
 * current node or block.
 */
export class ParseContext {
  private constructor(
    readonly document: ConfigDocument,
    readonly sourceName: string,
    readonly focus: Focus,
  ) {}

  static root(document: ConfigDocument, sourceName: string): ParseContext {
    return new ParseContext(document, sourceName, { kind: "document", block: document.root })
  }

  enterBlock(): ParseContext {
    if (this.focus.kind === "document") {
      throw this.error(
        "Cannot enter block: current context is already a document root",
        "structural",
      )
    }

    const children = this.focus.node.children

    if (children === null) {
      throw this.error("Expected a children block { ... }, but none found", "structural")
    }

    return new ParseContext(this.document, this.sourceName, {
      kind: "document",
      block: children,
    })
  }

  forNode(node: DocumentNode): ParseContext {
    return new ParseContext(this.document, this.sourceName, { kind: "node", node })
  }

  currentSpan(): SourceSpan {
    return this.focus.kind === "document" ? this.focus.block.span : this.focus.node.span
  }

  error(message: string, kind: DiagnosticKind): ConfigDiagnostic {
    return this.errorWithSpan(message, this.currentSpan(), kind)
  }

  /** Like {@link error}, pointing at `span` (usually one entry) instead of the whole node. */
  errorWithSpan(message: string, span: SourceSpan, kind: DiagnosticKind): ConfigDiagnostic {
    return new ConfigDiagnostic(message, {
      kind,
      document: this.document,
      sourceName: this.sourceName,
      span,
    })
  }

  name(): string {
    return this.node().name
  }

  expectName(expected: string): void {
    if (this.focus.kind === "document") {
      throw this.error(`Expected node '${expected}', but current is a document`, "structural")
    }

    if (this.focus.node.name !== expected) {
      throw this.error(`Expected '${expected}', found '${this.focus.node.name}'`, "structural")
    }
  }

  hasChildrenBlock(): boolean {
    return this.node().children !== null
  }

  nodes(): ParseContext[] {
    const block = this.focus.kind === "document" ? this.focus.block : this.focus.node.children

    if (block === null) {
      throw this.error("Expected children block", "structural")
    }

    return block.nodes.map((node) => this.forNode(node))
  }

  reqNodes(): ParseContext[] {
    const nodes = this.nodes()

    if (nodes.length === 0) {
      const message =
        this.focus.kind === "node"
          ? `Block '${this.focus.node.name}' cannot be empty`
          : "Block cannot be empty"

      throw this.error(message, "structural")
    }

    return nodes
  }

  args(): readonly DocumentEntry[] {
    return this.node().entries
  }

  /**
   * Named entries within `range` as text (see {@link TypedValue.asStringLossy}).
   * Positional and `#null` entries are skipped; for a repeated key the first
   * one wins.
   */
  argsMap(range: ArgRange = {}): Map<string, string> {
    const args = this.args()
    const start = range.start ?? 0
    const end = range.end ?? args.length

    if (start > args.length || end > args.length || start > end) {
      throw this.error("Range out of bounds", "structural")
    }

    const map = new Map<string, string>()

    for (const entry of args.slice(start, end)) {
      if (entry.name === null || entry.value.kind === "null" || map.has(entry.name)) continue

      map.set(entry.name, new TypedValue(this, entry).asStringLossy())
    }

    return map
  }

  argsMapWithOnlyKeys(range: ArgRange, allowed: readonly string[]): Map<string, string> {
    const map = this.argsMap(range)

    for (const key of map.keys()) {
      if (!allowed.includes(key)) {
        throw this.error(
          `Unknown configuration key: '${key}'. Allowed keys are: ${formatKeyList(allowed)}`,
          "unknown_key",
        )
      }
    }

    return map
  }

  prop(key: string): TypedValue {
    const value = this.optProp(key)

    if (value === undefined) {
      throw this.error(`Missing required property '${key}'`, "missing_required")
    }

    return value
  }

  optProp(key: string): TypedValue | undefined {
    const entry = this.args().find((e) => e.name === key)

    return entry && new TypedValue(this, entry)
  }

  props(keys: readonly string[]): (TypedValue | undefined)[] {
    return keys.map((key) => this.optProp(key))
  }

  /** First entry, positional or named. */
  first(): TypedValue {
    const entry = this.args()[0]

    if (entry === undefined) {
      throw this.error("Missing required first argument", "missing_required")
    }

    return new TypedValue(this, entry)
  }

  /** `index`-th positional entry, ignoring named ones. */
  arg(index: number): TypedValue {
    const entry = this.args().filter((e) => e.name === null)[index]

    if (entry === undefined) {
      throw this.error(`Missing required argument at position ${index + 1}`, "missing_required")
    }

    return new TypedValue(this, entry)
  }

  /** The node's own name read as `type`, for nodes whose name carries data. */
  parseName<T>(type: ScalarType<T>): T {
    const name = this.name()
    const result = type.parse(name)

    if (result.kind === "rejected") {
      throw this.error(formatParseFailure(type.typeName, name, result.reason), "format")
    }

    return result.value
  }

  validate(rules: readonly Rule[]): void {
    validateRules(this, rules)
  }

  private node(): DocumentNode {
    if (this.focus.kind === "document") {
      throw this.error("Expected node, but current is a document", "structural")
    }

    return this.focus.node
  }
}
