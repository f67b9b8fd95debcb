import type { ConfigDocument } from "./document"

export type SourceDocument = {
  readonly document: ConfigDocument
  /** Label used in diagnostics, e.g. a path relative to the working directory. */
  readonly sourceName: string
}

/**
 * Resolves an entry point into parsed documents.
 *
 * Sources only read and parse; they do not interpret the configuration. A
 * source follows top-level `include "<path>"` directives and returns every
 * document once, the including document before the ones it includes.
 */
export interface DocumentSource {
  /**
   * Human-readable name for logs.
   * Example: "file", "text"
   */
  readonly name: string

  collect(entry: string): Promise<SourceDocument[]>
}
