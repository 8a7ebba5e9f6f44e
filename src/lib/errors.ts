/**
 * Errors raised while building, validating, reading or writing metadata.
 * Every failure carries a code so callers can branch without parsing messages.
 */

export enum ErrorCode {
  // construction
  UNKNOWN_ATTRIBUTE = 'UnknownAttribute',
  TOO_MANY_ARGUMENTS = 'TooManyArguments',
  MISSING_REQUIRED_ATTRIBUTE = 'MissingRequiredAttribute',
  TYPE_MISMATCH = 'TypeMismatch',

  // validation
  FIELD_COUNT_MISMATCH = 'FieldCountMismatch',
  UNSUPPORTED_FORMAT_VERSION = 'UnsupportedFormatVersion',
  DUPLICATE_FIELD_NAME = 'DuplicateFieldName',
  UNKNOWN_CANONICAL_TYPE = 'UnknownCanonicalType',
  UNKNOWN_FIELD = 'UnknownField',

  // inference
  UNKNOWN_STORAGE_TYPE = 'UnknownStorageType',
  UNKNOWN_TYPE = 'UnknownType',

  // boundary
  TABLE_UNAVAILABLE = 'TableUnavailable',
  UNSUPPORTED_ENCODING = 'UnsupportedEncoding',
}

export class PmmError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'PmmError'
  }

  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : ''
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`
  }

  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

export function isPmmError(error: unknown): error is PmmError {
  return error instanceof PmmError
}
