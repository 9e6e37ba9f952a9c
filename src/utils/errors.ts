/**
 * Central error classes and validation utilities for claims-flattener
 * @module utils/errors
 */

/**
 * Base error class for all claims-flattener errors
 */
export class ClaimsJoinError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ClaimsJoinError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when one or more required input tables are absent.
 * Raised before any join executes.
 */
export class MissingInputError extends ClaimsJoinError {
  public readonly missingFiles: string[]

  constructor(missingFiles: string[], dataDir: string) {
    super(
      `Missing required input file(s) in '${dataDir}': ${missingFiles.join(', ')}`,
      'MISSING_INPUT',
      { missingFiles, dataDir }
    )
    this.name = 'MissingInputError'
    this.missingFiles = missingFiles
  }
}

/**
 * Error thrown when a key or join column is absent from a table
 */
export class SchemaMismatchError extends ClaimsJoinError {
  public readonly table: string
  public readonly missingColumns: string[]

  constructor(
    table: string,
    missingColumns: string[],
    context?: Record<string, unknown>
  ) {
    const where = context?.step ? ` (step '${String(context.step)}')` : ''
    super(
      `Table '${table}' is missing required column(s)${where}: ${missingColumns.join(', ')}`,
      'SCHEMA_MISMATCH',
      { table, missingColumns, ...context }
    )
    this.name = 'SchemaMismatchError'
    this.table = table
    this.missingColumns = missingColumns
  }
}

/**
 * Error thrown when the right-hand side of a join has duplicate values
 * for its declared unique key. Joining through would multiply root rows.
 */
export class KeyCardinalityViolation extends ClaimsJoinError {
  public readonly table: string
  public readonly keyColumns: string[]
  public readonly duplicateKey: unknown[]
  public readonly occurrences: number

  constructor(
    table: string,
    keyColumns: string[],
    duplicateKey: unknown[],
    occurrences: number,
    context?: Record<string, unknown>
  ) {
    const where = context?.step ? ` before step '${String(context.step)}'` : ''
    super(
      `Key (${keyColumns.join(', ')}) = (${duplicateKey.map(String).join(', ')}) occurs ${occurrences} times in table '${table}'${where}`,
      'KEY_CARDINALITY_VIOLATION',
      { table, keyColumns, duplicateKey, occurrences, ...context }
    )
    this.name = 'KeyCardinalityViolation'
    this.table = table
    this.keyColumns = keyColumns
    this.duplicateKey = duplicateKey
    this.occurrences = occurrences
  }
}

/**
 * Error thrown when delimited text cannot be parsed
 */
export class CsvParseError extends ClaimsJoinError {
  public readonly line: number

  constructor(message: string, line: number, context?: Record<string, unknown>) {
    super(`${message} (line ${line})`, 'CSV_PARSE_ERROR', { line, ...context })
    this.name = 'CsvParseError'
    this.line = line
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ClaimsJoinError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends ClaimsJoinError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends ClaimsJoinError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string
): T {
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that an array is non-empty
 */
export function requireNonEmptyArray<T>(
  value: readonly T[],
  parameterName: string
): readonly T[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an array'
    )
  }
  if (value.length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T extends string>(
  value: string,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Check if an error is a claims-flattener error
 */
export function isClaimsJoinError(error: unknown): error is ClaimsJoinError {
  return error instanceof ClaimsJoinError
}
