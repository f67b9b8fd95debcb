import type { ParseContext } from "../core/parser/parse-context"

/**
 * One configuration schema: a context in, a typed value out.
 *
 * Implementations throw a `ConfigDiagnostic` on the first problem they find.
 * They compose by handing sub-contexts to other section parsers.
 */
export interface SectionParser<T> {
  parse(ctx: ParseContext): T
}
