/**
 * Claim-level summary with patient names and rendering provider
 * @module report/claims-summary
 */

import type { Table } from '../types/table.js'
import type { SourceTables } from '../types/sources.js'
import {
  hasColumn,
  head,
  renameColumns,
  selectColumns,
  withName,
} from '../table/operations.js'
import { leftJoin } from '../join/left-join.js'

export const SUMMARY_PATIENT_COLUMNS = ['Id', 'FIRST', 'LAST', 'BIRTHDATE', 'GENDER'] as const

export const SUMMARY_PROVIDER_RENAMES: Readonly<Record<string, string>> = {
  Id: 'PROVIDERID',
  NAME: 'PROVIDER_NAME',
  SPECIALITY: 'PROVIDER_SPECIALTY',
}

/** Columns shown by {@link previewRows} when they exist */
export const DEFAULT_PREVIEW_COLUMNS: readonly string[] = [
  'Id',
  'PATIENTID',
  'FIRST',
  'LAST',
  'PRIMARYPATIENTINSURANCEID',
  'TOTALPAYMENTS',
]

/**
 * One row per claim, with the patient's `FIRST`, `LAST`, `BIRTHDATE` and
 * `GENDER` joined on `PATIENTID`, and the provider's `PROVIDER_NAME` and
 * `PROVIDER_SPECIALTY` joined on `PROVIDERID` when the claims carry it.
 *
 * @throws {SchemaMismatchError} If patients or providers lack a summary column
 * @throws {KeyCardinalityViolation} If patient or provider ids are not unique
 */
export function buildClaimsSummary(
  sources: Pick<SourceTables, 'claims' | 'patients' | 'providers'>
): Table {
  const patients = renameColumns(
    selectColumns(sources.patients, SUMMARY_PATIENT_COLUMNS),
    { Id: 'PATIENTID' }
  )
  let summary = leftJoin(withName(sources.claims, 'claims_summary'), patients, {
    leftKeys: ['PATIENTID'],
    rightKeys: ['PATIENTID'],
    step: 'summary patients',
  }).table

  if (hasColumn(summary, 'PROVIDERID')) {
    const providers = renameColumns(
      selectColumns(sources.providers, Object.keys(SUMMARY_PROVIDER_RENAMES)),
      SUMMARY_PROVIDER_RENAMES
    )
    summary = leftJoin(summary, providers, {
      leftKeys: ['PROVIDERID'],
      rightKeys: ['PROVIDERID'],
      step: 'summary providers',
    }).table
  }

  return summary
}

/**
 * First `limit` rows restricted to the display columns the table has.
 * Falls back to every column when none of them exist.
 */
export function previewRows(
  table: Table,
  columns: readonly string[] = DEFAULT_PREVIEW_COLUMNS,
  limit: number = 10
): Table {
  const available = columns.filter((column) => hasColumn(table, column))
  const selected = available.length > 0 ? selectColumns(table, available) : table
  return head(selected, limit)
}

/**
 * Renders a table as fixed-width text lines (header first)
 */
export function formatTable(table: Table): string[] {
  const cells = table.rows.map((row) =>
    table.columns.map((column) => {
      const value = row[column]
      return value === null || value === undefined ? '' : String(value)
    })
  )
  const widths = table.columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index].length))
  )
  const render = (values: readonly string[]) =>
    values.map((value, index) => value.padStart(widths[index])).join(' ')

  return [render(table.columns), ...cells.map(render)]
}
