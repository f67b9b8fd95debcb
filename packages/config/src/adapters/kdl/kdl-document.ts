import { type Document, type Entry, getLocation, type Node, parse } from "@bgotink/kdl"
import type {
  ConfigDocument,
  DocumentBlock,
  DocumentEntry,
  DocumentNode,
  ScalarValue,
  SourceSpan,
} from "../../ports/document"
import { DocumentSourceError } from "../../core/diagnostics/document-source-error"

const RADIX_PREFIX = /^[+-]?0[xob]/

/**
 * Parses KDL text into a {@link ConfigDocument}.
 *
 * Syntax errors become a `DocumentSourceError` with code
 * `invalid_document`, carrying the tokenizer's error as `cause`.
 */
export function parseKdlDocument(text: string, sourceName: string): ConfigDocument {
  let parsed: Document

  try {
    parsed = parse(text, { storeLocations: true })
  } catch (err) {
    const detail = err instanceof Error ? `: ${err.message}` : ""

    throw new DocumentSourceError(`Invalid KDL document '${sourceName}'${detail}`, {
      code: "invalid_document",
      context: { sourceName },
      cause: err,
    })
  }

  return {
    text,
    root: {
      nodes: parsed.nodes.map((n) => toNode(n, text)),
      span: { offset: 0, length: text.length },
    },
  }
}

function toNode(node: Node, text: string): DocumentNode {
  const span = spanOf(node)

  return {
    name: node.getName(),
    entries: node.entries.map((e) => toEntry(e, text)),
    children: node.children === null ? null : toBlock(node.children, span, text),
    span,
  }
}

function toBlock(document: Document, span: SourceSpan, text: string): DocumentBlock {
  return { nodes: document.nodes.map((n) => toNode(n, text)), span }
}

function toEntry(entry: Entry, text: string): DocumentEntry {
  const span = spanOf(entry)

  return { name: entry.getName(), value: toScalar(entry.getValue(), literalOf(text, span)), span }
}

function toScalar(value: string | number | boolean | null, literal: string): ScalarValue {
  if (value === null) return { kind: "null", value }
  if (typeof value === "string") return { kind: "string", value }
  if (typeof value === "boolean") return { kind: "boolean", value }

  const decimal = !RADIX_PREFIX.test(literal) && /[.eE]/.test(literal)

  return Number.isInteger(value) && !decimal
    ? { kind: "integer", value }
    : { kind: "float", value }
}

/** Value part of an entry's source text, without `key=`. */
function literalOf(text: string, span: SourceSpan): string {
  const raw = text.slice(span.offset, span.offset + span.length).trim()
  const eq = raw.indexOf("=")

  return eq === -1 ? raw : raw.slice(eq + 1).trim()
}

function spanOf(element: Node | Entry): SourceSpan {
  const location = getLocation(element)

  if (location === undefined) return { offset: 0, length: 0 }

  return {
    offset: location.start.offset,
    length: Math.max(0, location.end.offset - location.start.offset),
  }
}
