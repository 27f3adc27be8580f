/**
 * Error taxonomy for report generation. Fatal errors abort the run;
 * the others are recovered locally and surface as warnings.
 */

export type ReportErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'METADATA_UNAVAILABLE'
  | 'MALFORMED_ROW'
  | 'OUTPUT_WRITE_FAILURE'

export class ReportError extends Error {
  readonly code: ReportErrorCode
  readonly fatal: boolean

  constructor(code: ReportErrorCode, message: string, fatal: boolean, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.fatal = fatal
  }
}

/** Response table missing, unreadable or without a header row */
export class InputNotFoundError extends ReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INPUT_NOT_FOUND', message, true, options)
  }
}

/** Definition file unreadable or malformed; labels fall back to inference */
export class MetadataUnavailableError extends ReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('METADATA_UNAVAILABLE', message, false, options)
  }
}

/** Row with an unexpected number of cells; padded or truncated */
export class MalformedRowError extends ReportError {
  readonly rowNumber: number

  constructor(rowNumber: number, message: string) {
    super('MALFORMED_ROW', message, false)
    this.rowNumber = rowNumber
  }
}

export class OutputWriteError extends ReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OUTPUT_WRITE_FAILURE', message, true, options)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
