/**
 * Encounter-level aggregation of clinical fact tables
 * @module transform/fact-aggregator
 */

import type { CellValue, Row, Table } from '../types/table.js'
import { createTable, hasColumn, isMissing, requireColumns } from '../table/operations.js'
import { requireNonEmptyArray } from '../utils/errors.js'

/**
 * Kinds of clinical facts recorded against an encounter
 */
export type FactKind = 'procedure' | 'condition' | 'medication'

/** Separator placed between values of a multi-valued aggregate field */
export const LIST_SEPARATOR = '|'

/** Composite key grouping facts per patient visit */
export const FACT_GROUP_KEYS: readonly string[] = ['PATIENT', 'ENCOUNTER']

export interface AggregateOptions {
  kind: FactKind
  /** Grouping columns (default `PATIENT`, `ENCOUNTER`) */
  groupBy?: readonly string[]
  /** Column holding the fact code (default `CODE`) */
  codeColumn?: string
  /** Column holding the fact description (default `DESCRIPTION`) */
  descriptionColumn?: string
}

/**
 * Output column names for a fact kind, e.g. `PROCEDURE_CODES`
 */
export function aggregateColumnNames(kind: FactKind): {
  codes: string
  descriptions: string
} {
  const stem = kind.toUpperCase()
  return {
    codes: `${stem}_CODES`,
    descriptions: `${stem}_DESCRIPTIONS`,
  }
}

function joinValues(values: readonly CellValue[]): string {
  return values
    .filter((value) => !isMissing(value))
    .map((value) => String(value))
    .join(LIST_SEPARATOR)
}

interface FactGroup {
  key: CellValue[]
  codes: CellValue[]
  descriptions: CellValue[]
}

/**
 * Collapses a clinical fact table to one row per grouping key.
 *
 * Groups appear in order of their first row; inside a group codes and
 * descriptions keep input order. Missing and blank values are dropped
 * rather than kept as empty segments, so the code list and the description
 * list of one group may differ in length. Rows with a null grouping value
 * are skipped.
 *
 * An empty table produces an empty aggregate that still has the grouping
 * and aggregate columns. A table that already carries the aggregate columns
 * is accepted as input and reproduces itself.
 *
 * @throws {SchemaMismatchError} If a non-empty table lacks a grouping,
 * code or description column
 *
 * @example
 * ```typescript
 * const agg = aggregateFacts(procedures, { kind: 'procedure' })
 * agg.columns // ['PATIENT', 'ENCOUNTER', 'PROCEDURE_CODES', 'PROCEDURE_DESCRIPTIONS']
 * ```
 */
export function aggregateFacts(table: Table, options: AggregateOptions): Table {
  const groupBy = requireNonEmptyArray(options.groupBy ?? FACT_GROUP_KEYS, 'groupBy')
  const output = aggregateColumnNames(options.kind)
  const columns = [...groupBy, output.codes, output.descriptions]

  if (table.rows.length === 0) {
    return createTable(table.name, columns)
  }

  // Re-aggregating an aggregate reads its own list columns
  const alreadyAggregated =
    hasColumn(table, output.codes) && hasColumn(table, output.descriptions)
  const codeColumn = alreadyAggregated ? output.codes : (options.codeColumn ?? 'CODE')
  const descriptionColumn = alreadyAggregated
    ? output.descriptions
    : (options.descriptionColumn ?? 'DESCRIPTION')

  requireColumns(table, [...groupBy, codeColumn, descriptionColumn], {
    step: `aggregate ${options.kind}`,
  })

  const groups = new Map<string, FactGroup>()
  for (const row of table.rows) {
    const key = groupBy.map((column) => row[column] ?? null)
    if (key.some((value) => value === null)) continue

    const id = JSON.stringify(key)
    let group = groups.get(id)
    if (!group) {
      group = { key, codes: [], descriptions: [] }
      groups.set(id, group)
    }
    group.codes.push(row[codeColumn] ?? null)
    group.descriptions.push(row[descriptionColumn] ?? null)
  }

  const rows: Row[] = []
  for (const group of groups.values()) {
    const row: Row = {}
    groupBy.forEach((column, index) => {
      row[column] = group.key[index]
    })
    row[output.codes] = joinValues(group.codes)
    row[output.descriptions] = joinValues(group.descriptions)
    rows.push(row)
  }

  return { name: table.name, columns, rows }
}
