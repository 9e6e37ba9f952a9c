/**
 * A single cell value. Empty source cells are represented as `null`.
 */
export type CellValue = string | number | boolean | null

/**
 * One record of a table, keyed by column name.
 */
export type Row = Record<string, CellValue>

/**
 * An in-memory table: an ordered column list plus rows.
 * Tables are treated as immutable; every operation returns a new table.
 *
 * @example
 * ```typescript
 * const claims: Table = {
 *   name: 'claims',
 *   columns: ['Id', 'PATIENTID'],
 *   rows: [{ Id: 'C1', PATIENTID: 'P1' }],
 * }
 * ```
 */
export interface Table {
  /** Name used in log lines and error messages */
  readonly name: string
  /** Column names in output order */
  readonly columns: readonly string[]
  /** Records; every row carries every column (missing values are `null`) */
  readonly rows: readonly Row[]
}

/**
 * Inferred storage type of a loaded column
 */
export type ColumnType = 'string' | 'number' | 'empty'
