/**
 * Delimited-text parsing and serialization.
 * Supports quoted fields containing delimiters, doubled quotes and line breaks.
 * @module io/csv
 */

import type { CellValue, ColumnType, Row, Table } from '../types/table.js'
import { CsvParseError } from '../utils/errors.js'

export interface CsvParseOptions {
  /** Field delimiter (default `,`) */
  delimiter?: string
  /**
   * Convert columns whose non-empty values are all numeric into numbers
   * (default true). Empty cells always become `null`.
   */
  inferTypes?: boolean
}

export interface CsvWriteOptions {
  delimiter?: string
  lineEnding?: '\n' | '\r\n'
}

export interface ParsedCsv {
  header: string[]
  records: string[][]
}

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/
const INTEGER_PATTERN = /^[+-]?\d+$/

/** Integers a double cannot hold exactly stay text */
function isExactNumber(value: string): boolean {
  if (!NUMERIC_PATTERN.test(value)) return false
  return !INTEGER_PATTERN.test(value) || Number.isSafeInteger(Number(value))
}

/**
 * Splits delimited text into a header and raw string records.
 * Blank lines are skipped. Short records are padded with empty fields.
 *
 * @throws {CsvParseError} On an unterminated quoted field, a duplicate header
 * name or a record wider than the header
 */
export function parseCsvText(content: string, delimiter: string = ','): ParsedCsv {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content
  const lines: string[][] = []

  let fields: string[] = []
  let current = ''
  let inQuotes = false
  let quotedField = false
  let line = 1
  let quoteStartLine = 1

  const endRecord = () => {
    fields.push(current)
    const blank = fields.length === 1 && fields[0] === '' && !quotedField
    if (!blank) {
      lines.push(fields)
    }
    fields = []
    current = ''
    quotedField = false
  }

  for (let i = 0; i < text.length; i++) {
    const char = text[i]

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        if (char === '\n') line++
        current += char
      }
      continue
    }

    if (char === '"' && current === '') {
      inQuotes = true
      quotedField = true
      quoteStartLine = line
    } else if (char === delimiter) {
      fields.push(current)
      current = ''
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++
      }
      endRecord()
      line++
    } else {
      current += char
    }
  }

  if (inQuotes) {
    throw new CsvParseError('Unterminated quoted field', quoteStartLine)
  }
  if (current !== '' || fields.length > 0 || quotedField) {
    endRecord()
  }

  if (lines.length === 0) {
    return { header: [], records: [] }
  }

  const [header, ...records] = lines
  const seen = new Set<string>()
  for (const name of header) {
    if (seen.has(name)) {
      throw new CsvParseError(`Duplicate column name '${name}' in header`, 1)
    }
    seen.add(name)
  }

  records.forEach((record, index) => {
    if (record.length > header.length) {
      throw new CsvParseError(
        `Expected ${header.length} fields but found ${record.length}`,
        index + 2,
        { columns: header.length, fields: record.length }
      )
    }
    while (record.length < header.length) {
      record.push('')
    }
  })

  return { header, records }
}

/**
 * Determines the storage type of a column from its raw values. A column
 * holding an integer beyond `Number.MAX_SAFE_INTEGER` stays `string`.
 */
export function inferColumnType(values: readonly string[]): ColumnType {
  let sawValue = false
  for (const value of values) {
    if (value === '') continue
    sawValue = true
    if (!isExactNumber(value.trim())) {
      return 'string'
    }
  }
  return sawValue ? 'number' : 'empty'
}

function convertCell(raw: string, type: ColumnType): CellValue {
  if (raw === '') {
    return null
  }
  return type === 'number' ? Number(raw.trim()) : raw
}

/**
 * Parses delimited text into a {@link Table}
 *
 * @example
 * ```typescript
 * const table = parseCsv('claims', 'Id,AMOUNT\nC1,12.5\n')
 * // table.rows -> [{ Id: 'C1', AMOUNT: 12.5 }]
 * ```
 */
export function parseCsv(
  name: string,
  content: string,
  options: CsvParseOptions = {}
): Table {
  const { delimiter = ',', inferTypes = true } = options
  const { header, records } = parseCsvText(content, delimiter)

  const types: ColumnType[] = header.map((_, index) =>
    inferTypes ? inferColumnType(records.map((record) => record[index])) : 'string'
  )

  const rows: Row[] = records.map((record) => {
    const row: Row = {}
    header.forEach((column, index) => {
      row[column] = convertCell(record[index], types[index])
    })
    return row
  })

  return { name, columns: header, rows }
}

function formatCell(value: CellValue | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return ''
  }
  const text = String(value)
  if (
    text.includes(delimiter) ||
    text.includes('"') ||
    text.includes('\n') ||
    text.includes('\r')
  ) {
    return `"${text.replace(/"/g, '""')}"`
  }
  return text
}

/**
 * Serializes a table as delimited text: a header line, then one line per row.
 * Null cells are written as empty fields.
 */
export function serializeCsv(table: Table, options: CsvWriteOptions = {}): string {
  const { delimiter = ',', lineEnding = '\n' } = options
  const lines = [
    table.columns.map((column) => formatCell(column, delimiter)).join(delimiter),
  ]
  for (const row of table.rows) {
    lines.push(
      table.columns.map((column) => formatCell(row[column], delimiter)).join(delimiter)
    )
  }
  return lines.join(lineEnding) + lineEnding
}
