/**
 * Consolidated error system for timelog.
 *
 * All error classes extend TimelogError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * where they are raised.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const TimelogErrorCode = {
  // Timestamp parsing
  PARSE_ERROR: 'PARSE_ERROR',

  // Period construction
  INVALID_PERIOD: 'INVALID_PERIOD',

  // Quantization
  INVALID_RESOLUTION: 'INVALID_RESOLUTION',

  // Input
  LOG_FILE: 'LOG_FILE',
  USAGE: 'USAGE',
} as const

export type TimelogErrorCode = (typeof TimelogErrorCode)[keyof typeof TimelogErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TimelogError extends Error {
  readonly code: TimelogErrorCode

  constructor(code: TimelogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TimelogError'
    this.code = code
  }
}

// ============================================================================
// Parsing Errors
// ============================================================================

export class ParseError extends TimelogError {
  constructor(message: string) {
    super(TimelogErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Domain Contract Errors
// ============================================================================

/** A Period was built with inconsistent or negative bounds */
export class InvalidPeriodError extends TimelogError {
  constructor(message: string) {
    super(TimelogErrorCode.INVALID_PERIOD, message)
    this.name = 'InvalidPeriodError'
  }
}

export class InvalidResolutionError extends TimelogError {
  constructor(message: string) {
    super(TimelogErrorCode.INVALID_RESOLUTION, message)
    this.name = 'InvalidResolutionError'
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class LogFileError extends TimelogError {
  readonly path: string

  constructor(path: string, message: string, cause?: unknown) {
    super(TimelogErrorCode.LOG_FILE, message, { cause })
    this.name = 'LogFileError'
    this.path = path
  }
}

export class UsageError extends TimelogError {
  constructor(message: string) {
    super(TimelogErrorCode.USAGE, message)
    this.name = 'UsageError'
  }
}
