/**
 * Column namespacing for dimension tables
 * @module transform/namespacer
 */

import type { Table } from '../types/table.js'
import { renameColumns } from '../table/operations.js'
import { requireNonEmptyString } from '../utils/errors.js'

/**
 * Dimension tables joined into the transaction stream for descriptive context
 */
export type DimensionName = 'patient' | 'provider' | 'organization' | 'payer'

/**
 * Prefix applied to every non-key column of each dimension before joining
 */
export const DIMENSION_PREFIXES: Readonly<Record<DimensionName, string>> = {
  patient: 'PATIENT_',
  provider: 'PROVIDER_',
  organization: 'ORG_',
  payer: 'PAYER_',
}

/** Natural key column shared by every dimension table */
export const DIMENSION_KEY_COLUMN = 'Id'

export interface NamespaceOptions {
  /** Column left unrenamed so the table stays joinable (default `Id`) */
  keyColumn?: string
}

/**
 * Returns a copy of the table where every column except the key is renamed
 * `prefix + name`.
 *
 * Columns that already start with `prefix` are left alone, so applying the
 * same prefix twice gives the same result as applying it once. Columns that
 * start with another dimension's prefix are also left alone.
 *
 * @example
 * ```typescript
 * namespaceTable(payers, 'PAYER_').columns
 * // ['Id', 'PAYER_NAME', 'PAYER_OWNERSHIP', ...]
 * ```
 */
export function namespaceTable(
  table: Table,
  prefix: string,
  options: NamespaceOptions = {}
): Table {
  requireNonEmptyString(prefix, 'prefix')
  const keyColumn = options.keyColumn ?? DIMENSION_KEY_COLUMN
  const foreignPrefixes = Object.values(DIMENSION_PREFIXES).filter((p) => p !== prefix)

  const mapping: Record<string, string> = {}
  for (const column of table.columns) {
    if (column === keyColumn || column.startsWith(prefix)) continue
    if (foreignPrefixes.some((foreign) => column.startsWith(foreign))) continue
    mapping[column] = `${prefix}${column}`
  }

  return renameColumns(table, mapping)
}

/**
 * Namespaces a dimension table with its registered prefix
 */
export function namespaceDimension(
  table: Table,
  dimension: DimensionName,
  options: NamespaceOptions = {}
): Table {
  return namespaceTable(table, DIMENSION_PREFIXES[dimension], options)
}

/**
 * Lists non-key column names present in more than one of the given tables.
 * An empty result means the tables can be joined without collisions.
 */
export function findSharedColumns(
  tables: readonly Table[],
  keyColumn: string = DIMENSION_KEY_COLUMN
): string[] {
  const owners = new Map<string, Set<string>>()
  for (const table of tables) {
    for (const column of table.columns) {
      if (column === keyColumn) continue
      const set = owners.get(column) ?? new Set<string>()
      set.add(table.name)
      owners.set(column, set)
    }
  }
  return [...owners.entries()]
    .filter(([, names]) => names.size > 1)
    .map(([column]) => column)
}
