/**
 * Neutral, read-only view of a parsed configuration document.
 *
 * The parsing core only ever sees these shapes; the KDL adapter builds them
 * from the tokenizer's output. Nodes are shared by reference and never copied
 * or mutated after construction.
 */

/** Location in the source text, in UTF-16 code units. */
export type SourceSpan = {
  readonly offset: number
  readonly length: number
}

export type ScalarKind = "string" | "integer" | "float" | "boolean" | "null"

export type ScalarValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "null"; readonly value: null }

export interface DocumentEntry {
  /** Property key, or `null` for a positional argument. */
  readonly name: string | null
  readonly value: ScalarValue
  readonly span: SourceSpan
}

export interface DocumentNode {
  readonly name: string
  readonly entries: readonly DocumentEntry[]
  /** `null` when the node has no `{ ... }` block at all; an empty block is an empty list. */
  readonly children: DocumentBlock | null
  readonly span: SourceSpan
}

export interface DocumentBlock {
  readonly nodes: readonly DocumentNode[]
  readonly span: SourceSpan
}

export interface ConfigDocument {
  /** Original text, kept for rendering diagnostics. */
  readonly text: string
  readonly root: DocumentBlock
}
