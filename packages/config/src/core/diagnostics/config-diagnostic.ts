import { BaseError } from "@gantry/errors"
import type { ConfigDocument, SourceSpan } from "../../ports/document"
import { locate, renderSnippet } from "./render-snippet"

export type DiagnosticKind =
  | "structural"
  | "missing_required"
  | "unknown_directive"
  | "unknown_key"
  | "type_mismatch"
  | "format"
  | "mutual_exclusion"

export type ConfigDiagnosticOptions = Readonly<{
  kind: DiagnosticKind
  document: ConfigDocument
  sourceName: string
  span: SourceSpan
}>

/**
 * A configuration problem anchored at a span of one source document.
 *
 * `help` is the message followed by the offending source line, ready to print.
 */
export class ConfigDiagnostic extends BaseError<DiagnosticKind> {
  readonly sourceName: string
  readonly span: SourceSpan
  readonly line: number
  readonly column: number
  readonly help: string

  constructor(message: string, options: ConfigDiagnosticOptions) {
    const { line, column } = locate(options.document.text, options.span.offset)

    super(message, {
      code: options.kind,
      context: {
        sourceName: options.sourceName,
        offset: options.span.offset,
        length: options.span.length,
        line,
        column,
      },
    })

    this.sourceName = options.sourceName
    this.span = options.span
    this.line = line
    this.column = column
    this.help = renderSnippet(message, options.document.text, options.sourceName, options.span)
  }
}
