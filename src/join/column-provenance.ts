/**
 * Column provenance tracking for the join pipeline
 * @module join/column-provenance
 */

/**
 * Where an output column came from.
 *
 * - `root`: carried over from the root (transaction) table
 * - `joined`: added by a join step from its right-hand table
 * - `conflict`: renamed with a conflict-marker suffix because both sides of
 *   a join step contributed the same name
 */
export type ColumnOrigin =
  | {
      kind: 'root'
      source: string
      sourceColumn: string
    }
  | {
      kind: 'joined'
      step: string
      source: string
      sourceColumn: string
    }
  | {
      kind: 'conflict'
      step: string
      side: 'left' | 'right'
      source: string
      sourceColumn: string
    }

/**
 * ColumnProvenanceTracker - records which source and join step introduced
 * every column of a growing join result.
 *
 * @example
 * ```typescript
 * const tracker = new ColumnProvenanceTracker()
 * tracker.recordRoot('claims_transactions', ['ID', 'CLAIMID'])
 * tracker.recordJoined('claims', 'claims', { CLAIM_ID: 'Id' })
 * tracker.get('CLAIM_ID') // { kind: 'joined', step: 'claims', ... }
 * ```
 */
export class ColumnProvenanceTracker {
  private readonly origins = new Map<string, ColumnOrigin>()

  /**
   * Records columns of the root table
   */
  recordRoot(source: string, columns: readonly string[]): void {
    for (const column of columns) {
      this.origins.set(column, { kind: 'root', source, sourceColumn: column })
    }
  }

  /**
   * Records columns a join step added.
   *
   * @param columns - Output column name mapped to its name in the source table
   */
  recordJoined(
    step: string,
    source: string,
    columns: Readonly<Record<string, string>>
  ): void {
    for (const [column, sourceColumn] of Object.entries(columns)) {
      this.origins.set(column, { kind: 'joined', step, source, sourceColumn })
    }
  }

  /**
   * Records a left-side column renamed by a conflict in `step`
   */
  recordLeftConflict(step: string, previousName: string, newName: string): void {
    const previous = this.origins.get(previousName)
    this.origins.delete(previousName)
    this.origins.set(newName, {
      kind: 'conflict',
      step,
      side: 'left',
      source: previous?.source ?? 'unknown',
      sourceColumn: previous?.sourceColumn ?? previousName,
    })
  }

  /**
   * Records a right-side column renamed by a conflict in `step`
   */
  recordRightConflict(
    step: string,
    source: string,
    sourceColumn: string,
    newName: string
  ): void {
    this.origins.set(newName, { kind: 'conflict', step, side: 'right', source, sourceColumn })
  }

  /**
   * Forgets dropped columns
   */
  drop(columns: readonly string[]): void {
    for (const column of columns) {
      this.origins.delete(column)
    }
  }

  get(column: string): ColumnOrigin | undefined {
    return this.origins.get(column)
  }

  /**
   * Columns whose name was produced by a join conflict
   */
  conflictColumns(): string[] {
    return [...this.origins.entries()]
      .filter(([, origin]) => origin.kind === 'conflict')
      .map(([column]) => column)
  }

  /**
   * Returns a snapshot of all tracked columns
   */
  snapshot(): ReadonlyMap<string, ColumnOrigin> {
    return new Map(this.origins)
  }
}
