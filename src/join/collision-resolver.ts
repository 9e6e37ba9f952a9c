/**
 * Final scan that removes columns left behind by ambiguous joins
 * @module join/collision-resolver
 */

import type { Table } from '../types/table.js'
import { dropColumns } from '../table/operations.js'
import type { ColumnOrigin, ColumnProvenanceTracker } from './column-provenance.js'
import { DEFAULT_CONFLICT_SUFFIXES } from './left-join.js'

export interface CollisionResolverOptions {
  /** Conflict-marker suffixes to scan for (default `_x`, `_y`) */
  suffixes?: readonly [string, string]
  /** Provenance of the joined table, used to report which step caused each drop */
  provenance?: ColumnProvenanceTracker
}

export interface DroppedColumn {
  column: string
  origin?: ColumnOrigin
}

export interface CollisionResolution {
  table: Table
  dropped: DroppedColumn[]
}

/**
 * Returns the columns whose name ends in a conflict-marker suffix
 */
export function findCollisionColumns(
  table: Table,
  suffixes: readonly [string, string] = DEFAULT_CONFLICT_SUFFIXES
): string[] {
  return table.columns.filter((column) =>
    suffixes.some((suffix) => column.endsWith(suffix))
  )
}

/**
 * Drops every column ending in a conflict-marker suffix and nothing else.
 * When the joins were fully namespaced this returns the table unchanged.
 */
export function resolveCollisions(
  table: Table,
  options: CollisionResolverOptions = {}
): CollisionResolution {
  const columns = findCollisionColumns(table, options.suffixes)
  if (columns.length === 0) {
    return { table, dropped: [] }
  }

  const dropped = columns.map((column) => ({
    column,
    origin: options.provenance?.get(column),
  }))
  options.provenance?.drop(columns)

  return { table: dropColumns(table, columns), dropped }
}
