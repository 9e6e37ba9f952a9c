/**
 * Immutable column operations on in-memory tables
 * @module table/operations
 */

import type { CellValue, Row, Table } from '../types/table.js'
import { SchemaMismatchError } from '../utils/errors.js'

/**
 * Creates a table, filling every column the row does not carry with `null`.
 */
export function createTable(
  name: string,
  columns: readonly string[],
  rows: ReadonlyArray<Partial<Row>> = []
): Table {
  const normalized = rows.map((row) => {
    const out: Row = {}
    for (const column of columns) {
      out[column] = row[column] ?? null
    }
    return out
  })
  return { name, columns: [...columns], rows: normalized }
}

/**
 * Returns a copy of the table under a different name
 */
export function withName(table: Table, name: string): Table {
  return { ...table, name }
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column)
}

/**
 * Throws {@link SchemaMismatchError} when any of the columns is absent.
 */
export function requireColumns(
  table: Table,
  columns: readonly string[],
  context?: Record<string, unknown>
): void {
  const missing = columns.filter((column) => !hasColumn(table, column))
  if (missing.length > 0) {
    throw new SchemaMismatchError(table.name, missing, context)
  }
}

/**
 * Renames columns. Names absent from the table are ignored, like a
 * rename map applied to a header that may not carry every entry.
 */
export function renameColumns(
  table: Table,
  mapping: Readonly<Record<string, string>>
): Table {
  const rename = (column: string): string =>
    Object.prototype.hasOwnProperty.call(mapping, column) ? mapping[column] : column

  const columns = table.columns.map(rename)
  const rows = table.rows.map((row) => {
    const out: Row = {}
    for (const column of table.columns) {
      out[rename(column)] = row[column] ?? null
    }
    return out
  })
  return { name: table.name, columns, rows }
}

/**
 * Drops columns. Names absent from the table are ignored.
 */
export function dropColumns(table: Table, columns: readonly string[]): Table {
  const dropped = new Set(columns)
  return selectColumns(
    table,
    table.columns.filter((column) => !dropped.has(column))
  )
}

/**
 * Keeps only the given columns, in the given order.
 *
 * @throws {SchemaMismatchError} If a requested column is absent
 */
export function selectColumns(table: Table, columns: readonly string[]): Table {
  requireColumns(table, columns)
  const rows = table.rows.map((row) => {
    const out: Row = {}
    for (const column of columns) {
      out[column] = row[column] ?? null
    }
    return out
  })
  return { name: table.name, columns: [...columns], rows }
}

/**
 * Returns the values of one column in row order
 */
export function columnValues(table: Table, column: string): CellValue[] {
  requireColumns(table, [column])
  return table.rows.map((row) => row[column] ?? null)
}

/**
 * Returns the first `limit` rows
 */
export function head(table: Table, limit: number): Table {
  return { ...table, rows: table.rows.slice(0, Math.max(0, limit)) }
}

/**
 * Missing means `null`/`undefined` or a string with no visible characters.
 */
export function isMissing(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) {
    return true
  }
  return typeof value === 'string' && value.trim().length === 0
}
