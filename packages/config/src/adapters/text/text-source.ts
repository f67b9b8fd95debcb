import path from "node:path"
import { collectDocuments } from "../../core/collect-documents"
import { DocumentSourceError } from "../../core/diagnostics/document-source-error"
import type { DocumentSource, SourceDocument } from "../../ports/document-source"

/**
 * In-memory documents keyed by posix path, e.g. for tests or for text
 * received over the wire. Includes resolve like relative file paths.
 */
export class TextSource implements DocumentSource {
  readonly name = "text"

  constructor(private readonly files: Readonly<Record<string, string>>) {}

  async collect(entry: string): Promise<SourceDocument[]> {
    return collectDocuments([path.posix.normalize(entry)], {
      resolve: (target, from) =>
        target.startsWith("/")
          ? path.posix.normalize(target)
          : path.posix.join(path.posix.dirname(from), target),
      read: async (file) => this.read(file),
      label: (file) => file,
    })
  }

  private read(file: string): string {
    if (!Object.hasOwn(this.files, file)) {
      throw new DocumentSourceError(`Configuration source not found: '${file}'`, {
        code: "source_not_found",
        context: { path: file },
      })
    }

    return this.files[file] ?? ""
  }
}
