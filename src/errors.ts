/**
 * Consolidated error system for well-gap-research.
 *
 * All error classes extend GapResearchError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const GapResearchErrorCode = {
  // Date ranges
  INVALID_RANGE: 'INVALID_RANGE',
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  FORMAT_ERROR: 'FORMAT_ERROR',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Gap research
  MISSING_CATEGORY: 'MISSING_CATEGORY',
  INCONSISTENT_RECORD: 'INCONSISTENT_RECORD',

  // Well records & collection
  INVALID_API_NUMBER: 'INVALID_API_NUMBER',
  VALIDATION: 'VALIDATION',
  COLLECTOR_NOT_FOUND: 'COLLECTOR_NOT_FOUND',

  // Gateway layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',
} as const

export type GapResearchErrorCode = (typeof GapResearchErrorCode)[keyof typeof GapResearchErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class GapResearchError extends Error {
  readonly code: GapResearchErrorCode

  constructor(code: GapResearchErrorCode, message: string) {
    super(message)
    this.name = 'GapResearchError'
    this.code = code
  }
}

// ============================================================================
// Date Range Errors
// ============================================================================

export class InvalidRangeError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

export class TypeMismatchError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.TYPE_MISMATCH, message)
    this.name = 'TypeMismatchError'
  }
}

export class FormatError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.FORMAT_ERROR, message)
    this.name = 'FormatError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Gap Research Errors
// ============================================================================

export class MissingCategoryError extends GapResearchError {
  readonly category: string
  readonly apiNums: readonly string[]

  constructor(category: string, apiNums: readonly string[]) {
    super(
      GapResearchErrorCode.MISSING_CATEGORY,
      `Category '${category}' is not registered for well(s): ${apiNums.join(', ')}`,
    )
    this.name = 'MissingCategoryError'
    this.category = category
    this.apiNums = apiNums
  }
}

export class InconsistentRecordError extends GapResearchError {
  readonly apiNum: string

  constructor(apiNum: string, message: string) {
    super(GapResearchErrorCode.INCONSISTENT_RECORD, message)
    this.name = 'InconsistentRecordError'
    this.apiNum = apiNum
  }
}

// ============================================================================
// Well Record & Collection Errors
// ============================================================================

export class InvalidApiNumberError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.INVALID_API_NUMBER, message)
    this.name = 'InvalidApiNumberError'
  }
}

export class ValidationError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class CollectorNotFoundError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.COLLECTOR_NOT_FOUND, message)
    this.name = 'CollectorNotFoundError'
  }
}

// ============================================================================
// Gateway Errors
// ============================================================================

export class DuplicateKeyError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends GapResearchError {
  constructor(message: string) {
    super(GapResearchErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}
