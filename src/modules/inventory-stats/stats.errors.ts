import { AppError } from '../../middlewares/error.middleware'

/**
 * The CSV does not have the expected shape (missing header, missing column, ragged rows)
 */
export class DataFormatError extends AppError {
  constructor(message: string) {
    super(message, 500)
  }
}

/**
 * A cell could not be converted to its column's type
 * row is 1-based over data rows, the header is not counted
 */
export class ParseError extends AppError {
  readonly row: number
  readonly column: string
  readonly value: string

  constructor(row: number, column: string, value: string, expected: string) {
    super(`Row ${row}, column "${column}": expected ${expected}, got "${value}"`, 500)
    this.row = row
    this.column = column
    this.value = value
  }
}

/**
 * The blob store could not deliver the CSV (network, auth, missing blob, timeout)
 */
export class SourceUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500)
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500)
  }
}
