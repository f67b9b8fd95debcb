import type { SourceSpan } from "../../ports/document"

export type SourcePosition = {
  /** 1-based */
  readonly line: number
  /** 1-based, in UTF-16 code units */
  readonly column: number
  /** The whole line containing the position, without its line break. */
  readonly lineText: string
}

export function locate(text: string, offset: number): SourcePosition {
  const at = Math.min(Math.max(offset, 0), text.length)
  const lineStart = at === 0 ? 0 : text.lastIndexOf("\n", at - 1) + 1
  const newline = text.indexOf("\n", at)
  const lineEnd = newline === -1 ? text.length : newline

  let line = 1
  for (let i = 0; i < lineStart; i++) {
    if (text.charCodeAt(i) === 10) line++
  }

  return {
    line,
    column: at - lineStart + 1,
    lineText: text.slice(lineStart, lineEnd).replace(/\r$/, ""),
  }
}

/**
 * Renders a message with the source line it points at:
 *
 * ```text
 * Unknown directive: 'filtr'
 *  --> chain.kdl:2:1
 *   |
 * 2 | filtr name="com.example.auth"
 *   | ^^^^^^^^^^^^^^^^^^^^^^^^^^^^^
 * ```
 *
 * Spans running past the end of the line are underlined up to the line end.
 */
export function renderSnippet(
  message: string,
  text: string,
  sourceName: string,
  span: SourceSpan,
): string {
  const { line, column, lineText } = locate(text, span.offset)
  const gutter = " ".repeat(String(line).length)
  const available = Math.max(1, lineText.length - (column - 1))
  const underline = "^".repeat(Math.max(1, Math.min(span.length, available)))

  return [
    message,
    `${gutter}--> ${sourceName}:${line}:${column}`,
    `${gutter} |`,
    `${line} | ${lineText}`,
    `${gutter} | ${" ".repeat(column - 1)}${underline}`,
  ].join("\n")
}
