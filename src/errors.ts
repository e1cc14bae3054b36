export type ScanErrorCode =
  | 'NOT_FOUND'
  | 'UNSUPPORTED_FORMAT'
  | 'PARSE_ERROR'
  | 'USAGE'

export class ScanError extends Error {
  readonly code: ScanErrorCode
  readonly file?: string

  constructor(
    code: ScanErrorCode,
    message: string,
    options: { file?: string, cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.file = options.file
  }
}

export class NotFoundError extends ScanError {
  constructor(label: string, file: string) {
    super('NOT_FOUND', `${label} not found: ${file}`, { file })
  }
}

export class UnsupportedFormatError extends ScanError {
  constructor(format: string, file?: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported configuration type: ${format}`, { file })
  }
}

export class ParseError extends ScanError {
  constructor(message: string, file?: string, cause?: unknown) {
    super('PARSE_ERROR', message, { file, cause })
  }
}

export class UsageError extends ScanError {
  constructor(message: string) {
    super('USAGE', message)
  }
}

export const describeError = (
  error: unknown
): string => {
  if (error instanceof Error) {
    return error.message
  }

  return String(error)
}
