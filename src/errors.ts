/**
 * Error codes raised by the conversion core
 */
export type ErrorCode =
  | 'ARCHIVE_FORMAT'
  | 'MALFORMED_CONTAINER'
  | 'ENTRY_NOT_FOUND'
  | 'ENCODING'
  | 'XML_PARSE'

/**
 * Base class for every conversion failure
 */
export class EpubdownError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EpubdownError'
    this.code = code
  }
}

/** Input is not a readable zip archive */
export class ArchiveFormatError extends EpubdownError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ARCHIVE_FORMAT', message, options)
    this.name = 'ArchiveFormatError'
  }
}

/** META-INF/container.xml is missing, unparsable or names no rootfile */
export class MalformedContainerError extends EpubdownError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_CONTAINER', message, options)
    this.name = 'MalformedContainerError'
  }
}

/** A required archive entry is absent */
export class EntryNotFoundError extends EpubdownError {
  readonly entry: string

  constructor(entry: string) {
    super('ENTRY_NOT_FOUND', `Entry not found in archive: ${entry}`)
    this.name = 'EntryNotFoundError'
    this.entry = entry
  }
}

/** A text entry is not valid UTF-8 */
export class EncodingError extends EpubdownError {
  readonly entry: string

  constructor(entry: string, options?: { cause?: unknown }) {
    super('ENCODING', `Entry is not valid UTF-8 text: ${entry}`, options)
    this.name = 'EncodingError'
    this.entry = entry
  }
}

/** A package or navigation document is not well-formed XML */
export class XmlParseError extends EpubdownError {
  readonly entry: string

  constructor(entry: string, detail: string) {
    super('XML_PARSE', `Malformed XML in ${entry}: ${detail}`)
    this.name = 'XmlParseError'
    this.entry = entry
  }
}

/**
 * Turn anything thrown into a message for logs
 * @param error - Caught value
 * @returns Human-readable message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
