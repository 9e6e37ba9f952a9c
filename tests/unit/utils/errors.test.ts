import { describe, it, expect } from 'vitest'
import {
  ClaimsJoinError,
  ConfigurationError,
  CsvParseError,
  InvalidParameterError,
  KeyCardinalityViolation,
  MissingInputError,
  MissingParameterError,
  SchemaMismatchError,
  isClaimsJoinError,
  requireNonEmptyArray,
  requireNonEmptyString,
  requireNonNull,
  requireOneOf,
} from '../../../src/utils/errors.js'

describe('errors', () => {
  describe('error classes', () => {
    it('should describe missing input files', () => {
      const error = new MissingInputError(['claims.csv', 'payers.csv'], 'export/csv')

      expect(error).toBeInstanceOf(ClaimsJoinError)
      expect(error.name).toBe('MissingInputError')
      expect(error.code).toBe('MISSING_INPUT')
      expect(error.message).toBe(
        "Missing required input file(s) in 'export/csv': claims.csv, payers.csv"
      )
      expect(error.context).toEqual({
        missingFiles: ['claims.csv', 'payers.csv'],
        dataDir: 'export/csv',
      })
    })

    it('should describe a schema mismatch with and without a step', () => {
      expect(new SchemaMismatchError('claims', ['Id']).message).toBe(
        "Table 'claims' is missing required column(s): Id"
      )
      expect(new SchemaMismatchError('joined', ['PAYER'], { step: 'payers' }).message).toBe(
        "Table 'joined' is missing required column(s) (step 'payers'): PAYER"
      )
    })

    it('should describe a key cardinality violation', () => {
      const error = new KeyCardinalityViolation('procedures', ['PATIENT', 'ENCOUNTER'], ['P1', 'E1'], 2, {
        step: 'procedures',
      })

      expect(error.code).toBe('KEY_CARDINALITY_VIOLATION')
      expect(error.message).toBe(
        "Key (PATIENT, ENCOUNTER) = (P1, E1) occurs 2 times in table 'procedures' before step 'procedures'"
      )
      expect(error.context).toMatchObject({ step: 'procedures', occurrences: 2 })
    })

    it('should append the line number to parse errors', () => {
      const error = new CsvParseError('Unterminated quoted field', 7)

      expect(error.message).toBe('Unterminated quoted field (line 7)')
      expect(error.line).toBe(7)
    })

    it('should carry the configuration field', () => {
      const error = new ConfigurationError('bad', 'delimiter')

      expect(error.code).toBe('CONFIGURATION_ERROR')
      expect(error.field).toBe('delimiter')
    })

    it('should be recognized by isClaimsJoinError', () => {
      expect(isClaimsJoinError(new MissingParameterError('logger'))).toBe(true)
      expect(isClaimsJoinError(new Error('plain'))).toBe(false)
      expect(isClaimsJoinError('text')).toBe(false)
    })
  })

  describe('validation helpers', () => {
    it('should return valid values unchanged', () => {
      expect(requireNonNull(0, 'count')).toBe(0)
      expect(requireNonEmptyString('x', 'name')).toBe('x')
      expect(requireNonEmptyArray([1], 'items')).toEqual([1])
      expect(requireOneOf('info', ['info', 'warn'], 'level')).toBe('info')
    })

    it('should throw the matching parameter errors', () => {
      expect(() => requireNonNull(undefined, 'logger')).toThrow(
        "Missing required parameter: 'logger'"
      )
      expect(() => requireNonEmptyString(' ', 'name')).toThrow(InvalidParameterError)
      expect(() => requireNonEmptyArray([], 'items')).toThrow(
        "Invalid parameter 'items': must not be empty"
      )
      expect(() => requireOneOf('loud', ['info', 'warn'], 'level')).toThrow(
        "Invalid parameter 'level': must be one of: info, warn"
      )
    })
  })
})
