/**
 * Keyed left outer join between two in-memory tables
 * @module join/left-join
 */

import type { CellValue, Row, Table } from '../types/table.js'
import { requireColumns } from '../table/operations.js'
import {
  ClaimsJoinError,
  InvalidParameterError,
  KeyCardinalityViolation,
  requireNonEmptyArray,
} from '../utils/errors.js'

/** Suffixes a pairwise join appends to a name both sides contribute */
export const DEFAULT_CONFLICT_SUFFIXES: readonly [string, string] = ['_x', '_y']

export interface LeftJoinOptions {
  leftKeys: readonly string[]
  rightKeys: readonly string[]
  /** Leave the right-hand key columns out of the result (default false) */
  dropRightKeys?: boolean
  /** Left/right suffixes for names present on both sides (default `_x`, `_y`) */
  suffixes?: readonly [string, string]
  /** Step label used in error context */
  step?: string
}

/**
 * A name both sides contributed, and what each side was renamed to
 */
export interface JoinConflict {
  column: string
  leftName: string
  rightName: string
}

export interface LeftJoinResult {
  table: Table
  /** Left rows that found a right-hand match */
  matchedRows: number
  /** Output name of each right-hand column added, mapped to its right-hand name */
  addedColumns: Record<string, string>
  conflicts: JoinConflict[]
}

function keyOf(row: Row, columns: readonly string[]): CellValue[] | null {
  const key = columns.map((column) => row[column] ?? null)
  return key.some((value) => value === null) ? null : key
}

/** Keys compare by text, so `1` read as a number matches `"1"` read as text */
function keyId(key: readonly CellValue[]): string {
  return JSON.stringify(key.map((value) => String(value)))
}

/**
 * Verifies every non-null key of `table` occurs at most once.
 *
 * @throws {KeyCardinalityViolation} On the first duplicated key
 */
export function assertUniqueKey(
  table: Table,
  keyColumns: readonly string[],
  context?: Record<string, unknown>
): void {
  requireColumns(table, keyColumns, context)
  const counts = new Map<string, { key: CellValue[]; count: number }>()
  for (const row of table.rows) {
    const key = keyOf(row, keyColumns)
    if (key === null) continue
    const id = keyId(key)
    const entry = counts.get(id)
    if (entry) {
      entry.count++
    } else {
      counts.set(id, { key, count: 1 })
    }
  }
  for (const { key, count } of counts.values()) {
    if (count > 1) {
      throw new KeyCardinalityViolation(table.name, [...keyColumns], key, count, context)
    }
  }
}

/**
 * Left outer join of `right` onto `left`.
 *
 * Produces exactly one output row per left row: the right-hand key must be
 * unique, which is checked before any row is joined. Left rows whose key has
 * a null, or that match nothing, get `null` in every right-hand column.
 *
 * A right-hand key column named like its paired left key is never repeated.
 * Any other name present on both sides is kept twice, renamed with the left
 * and right conflict suffixes.
 *
 * @throws {SchemaMismatchError} If a key column is absent on either side
 * @throws {KeyCardinalityViolation} If the right-hand key has duplicates
 */
export function leftJoin(left: Table, right: Table, options: LeftJoinOptions): LeftJoinResult {
  const leftKeys = requireNonEmptyArray(options.leftKeys, 'leftKeys')
  const rightKeys = requireNonEmptyArray(options.rightKeys, 'rightKeys')
  if (leftKeys.length !== rightKeys.length) {
    throw new InvalidParameterError(
      'rightKeys',
      rightKeys,
      `must have the same length as leftKeys (${leftKeys.length})`
    )
  }
  const [leftSuffix, rightSuffix] = options.suffixes ?? DEFAULT_CONFLICT_SUFFIXES
  const context = options.step ? { step: options.step } : undefined

  requireColumns(left, leftKeys, context)
  assertUniqueKey(right, rightKeys, context)

  const omitted = new Set<string>()
  rightKeys.forEach((column, index) => {
    if (options.dropRightKeys || column === leftKeys[index]) {
      omitted.add(column)
    }
  })
  const rightColumns = right.columns.filter((column) => !omitted.has(column))

  const leftNames = new Map(left.columns.map((column) => [column, column]))
  const rightNames = new Map(rightColumns.map((column) => [column, column]))
  const conflicts: JoinConflict[] = []
  for (const column of rightColumns) {
    if (leftNames.has(column)) {
      const conflict = {
        column,
        leftName: `${column}${leftSuffix}`,
        rightName: `${column}${rightSuffix}`,
      }
      leftNames.set(column, conflict.leftName)
      rightNames.set(column, conflict.rightName)
      conflicts.push(conflict)
    }
  }

  const outputColumns = [...leftNames.values(), ...rightNames.values()]
  if (new Set(outputColumns).size !== outputColumns.length) {
    throw new ClaimsJoinError(
      `Join of '${right.name}' onto '${left.name}' produces duplicate column names`,
      'DUPLICATE_COLUMN',
      { ...context, conflicts }
    )
  }

  const index = new Map<string, Row>()
  for (const row of right.rows) {
    const key = keyOf(row, rightKeys)
    if (key !== null) {
      index.set(keyId(key), row)
    }
  }

  let matchedRows = 0
  const rows = left.rows.map((leftRow) => {
    const out: Row = {}
    for (const [column, name] of leftNames) {
      out[name] = leftRow[column] ?? null
    }

    const key = keyOf(leftRow, leftKeys)
    const match = key === null ? undefined : index.get(keyId(key))
    if (match) {
      matchedRows++
    }
    for (const [column, name] of rightNames) {
      out[name] = match ? (match[column] ?? null) : null
    }
    return out
  })

  const addedColumns: Record<string, string> = {}
  for (const [column, name] of rightNames) {
    addedColumns[name] = column
  }

  return {
    table: { name: left.name, columns: outputColumns, rows },
    matchedRows,
    addedColumns,
    conflicts,
  }
}
