import { BaseError } from "@gantry/errors"

export type DocumentSourceErrorCode = "source_not_found" | "source_unreadable" | "invalid_document"

/**
 * Raised by document sources when an entry or include cannot be turned into a
 * document at all. Problems inside a readable document are ConfigDiagnostics.
 */
export class DocumentSourceError extends BaseError<DocumentSourceErrorCode> {}
