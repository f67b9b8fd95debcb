import { parseKdlDocument } from "../adapters/kdl/kdl-document"
import type { SourceDocument } from "../ports/document-source"
import { includeDirectives } from "./sections/root-section"

/**
 * Storage access for {@link collectDocuments}. Paths are opaque to the
 * collector; the reader resolves and labels them.
 */
export type DocumentReader = {
  /** Resolves `target` as written in an `include` of the document at `from`. */
  resolve(target: string, from: string): string
  read(path: string): Promise<string>
  /** Source name shown in diagnostics. */
  label(path: string): string
}

/**
 * Reads and parses `entries` and everything they include, depth first.
 * Each path is collected once, so include cycles end.
 */
export async function collectDocuments(
  entries: readonly string[],
  reader: DocumentReader,
): Promise<SourceDocument[]> {
  const seen = new Set<string>()
  const collected: SourceDocument[] = []

  const visit = async (path: string): Promise<void> => {
    if (seen.has(path)) return
    seen.add(path)

    const sourceName = reader.label(path)
    const document = parseKdlDocument(await reader.read(path), sourceName)

    collected.push({ document, sourceName })

    for (const target of includeDirectives(document, sourceName)) {
      await visit(reader.resolve(target, path))
    }
  }

  for (const entry of entries) {
    await visit(entry)
  }

  return collected
}
