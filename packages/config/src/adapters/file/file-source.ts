import fs from "node:fs/promises"
import path from "node:path"
import { collectDocuments, type DocumentReader } from "../../core/collect-documents"
import { DocumentSourceError } from "../../core/diagnostics/document-source-error"
import type { DocumentSource, SourceDocument } from "../../ports/document-source"

export type FileSourceOptions = {
  /**
   * Base directory for relative entry paths and for source names.
   *
   * @default process.cwd()
   */
  cwd?: string

  /**
   * Extension of the files read when the entry is a directory.
   *
   * @default ".kdl"
   */
  extension?: string
}

/**
 * Reads configuration from disk. The entry is a file, or a directory whose
 * matching files are read in name order. Includes resolve against the
 * including file's directory.
 */
export class FileSource implements DocumentSource {
  readonly name = "file"

  private readonly cwd: string
  private readonly extension: string

  constructor(opts: FileSourceOptions = {}) {
    this.cwd = opts.cwd ?? process.cwd()
    this.extension = opts.extension ?? ".kdl"
  }

  async collect(entry: string): Promise<SourceDocument[]> {
    const entries = await this.expandEntry(path.resolve(this.cwd, entry))

    return collectDocuments(entries, this.reader)
  }

  private readonly reader: DocumentReader = {
    resolve: (target, from) => path.resolve(path.dirname(from), target),
    read: (file) => this.readFile(file),
    label: (file) => path.relative(this.cwd, file) || path.basename(file),
  }

  private async expandEntry(entry: string): Promise<string[]> {
    const stat = await fs.stat(entry).catch((err: unknown) => {
      throw this.toSourceError(err, entry)
    })

    if (!stat.isDirectory()) return [entry]

    const names = await fs.readdir(entry)

    return names
      .filter((n) => n.endsWith(this.extension))
      .sort()
      .map((n) => path.join(entry, n))
  }

  private async readFile(file: string): Promise<string> {
    try {
      return await fs.readFile(file, "utf-8")
    } catch (err) {
      throw this.toSourceError(err, file)
    }
  }

  private toSourceError(err: unknown, file: string): DocumentSourceError {
    const label = this.reader.label(file)

    if (errnoCode(err) === "ENOENT") {
      return new DocumentSourceError(`Configuration source not found: '${label}'`, {
        code: "source_not_found",
        context: { path: file },
        cause: err,
      })
    }

    return new DocumentSourceError(`Cannot read configuration source '${label}'`, {
      code: "source_unreadable",
      context: { path: file },
      cause: err,
    })
  }
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined
}
