/**
 * Join pipeline that widens every claim transaction with its claim,
 * encounter, dimension and clinical context
 * @module join/join-pipeline
 */

import type { Table } from '../types/table.js'
import type { SourceTables } from '../types/sources.js'
import { dropColumns, hasColumn, renameColumns, withName } from '../table/operations.js'
import { namespaceDimension } from '../transform/namespacer.js'
import { aggregateFacts, type FactKind } from '../transform/fact-aggregator.js'
import { ClaimsJoinError } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { ColumnProvenanceTracker } from './column-provenance.js'
import { DEFAULT_CONFLICT_SUFFIXES, leftJoin, type JoinConflict } from './left-join.js'
import { JOIN_PLAN, type JoinInputs, type JoinStep } from './join-plan.js'

export interface JoinPipelineOptions {
  /** Join steps in execution order (default {@link JOIN_PLAN}) */
  plan?: readonly JoinStep[]
  suffixes?: readonly [string, string]
  logger?: Logger
}

/**
 * Statistics for one executed join step
 */
export interface JoinStepReport {
  step: string
  rowsBefore: number
  rowsAfter: number
  matchedRows: number
  columnsAdded: string[]
  /** Helper columns removed after the step */
  columnsDropped: string[]
  conflicts: JoinConflict[]
}

export interface JoinPipelineResult {
  table: Table
  steps: JoinStepReport[]
  provenance: ColumnProvenanceTracker
}

/**
 * Namespaces the dimension tables and aggregates the clinical fact tables
 * of a loaded source set.
 */
export function prepareJoinInputs(
  sources: SourceTables,
  logger: Logger = createSilentLogger()
): JoinInputs {
  const aggregate = (table: Table, kind: FactKind): Table => {
    const result = aggregateFacts(table, { kind })
    logger.info(
      `${kind} facts aggregated: ${result.rows.length.toLocaleString('en-US')} encounter groups`
    )
    return result
  }

  return {
    transactions: sources.claims_transactions,
    claims: sources.claims,
    encounters: sources.encounters,
    patients: namespaceDimension(sources.patients, 'patient'),
    providers: namespaceDimension(sources.providers, 'provider'),
    organizations: namespaceDimension(sources.organizations, 'organization'),
    payers: namespaceDimension(sources.payers, 'payer'),
    procedures: aggregate(sources.procedures, 'procedure'),
    conditions: aggregate(sources.conditions, 'condition'),
    medications: aggregate(sources.medications, 'medication'),
  }
}

function invert(mapping: Readonly<Record<string, string>>): Record<string, string> {
  const inverted: Record<string, string> = {}
  for (const [from, to] of Object.entries(mapping)) {
    inverted[to] = from
  }
  return inverted
}

/**
 * Executes a join plan over the transaction table.
 *
 * @example
 * ```typescript
 * const pipeline = new JoinPipeline({ logger })
 * const { table, steps } = pipeline.run(prepareJoinInputs(sources))
 * ```
 */
export class JoinPipeline {
  private readonly plan: readonly JoinStep[]
  private readonly suffixes: readonly [string, string]
  private readonly logger: Logger

  constructor(options: JoinPipelineOptions = {}) {
    this.plan = options.plan ?? JOIN_PLAN
    this.suffixes = options.suffixes ?? DEFAULT_CONFLICT_SUFFIXES
    this.logger = options.logger ?? createSilentLogger()
  }

  getPlan(): readonly JoinStep[] {
    return this.plan
  }

  /**
   * Runs every step in order against the growing result.
   *
   * @throws {SchemaMismatchError} If a step's key column is absent
   * @throws {KeyCardinalityViolation} If a right-hand key is not unique
   */
  run(inputs: JoinInputs): JoinPipelineResult {
    const provenance = new ColumnProvenanceTracker()
    provenance.recordRoot(inputs.transactions.name, inputs.transactions.columns)

    let result = withName(inputs.transactions, 'joined')
    const steps: JoinStepReport[] = []

    for (const step of this.plan) {
      const source = inputs[step.right]
      const right = step.rename ? renameColumns(source, step.rename) : source
      const originalNames = step.rename ? invert(step.rename) : {}
      const rowsBefore = result.rows.length

      const joined = leftJoin(result, right, {
        leftKeys: step.leftKeys,
        rightKeys: step.rightKeys,
        dropRightKeys: step.dropRightKeys,
        suffixes: this.suffixes,
        step: step.name,
      })

      if (joined.table.rows.length !== rowsBefore) {
        throw new ClaimsJoinError(
          `Join step '${step.name}' changed the row count from ${rowsBefore} to ${joined.table.rows.length}`,
          'ROW_COUNT_CHANGED',
          { step: step.name, rowsBefore, rowsAfter: joined.table.rows.length }
        )
      }

      const conflictNames = new Set(joined.conflicts.map((c) => c.rightName))
      const sourceColumns: Record<string, string> = {}
      for (const [column, rightName] of Object.entries(joined.addedColumns)) {
        if (!conflictNames.has(column)) {
          sourceColumns[column] = originalNames[rightName] ?? rightName
        }
      }
      provenance.recordJoined(step.name, source.name, sourceColumns)
      for (const conflict of joined.conflicts) {
        provenance.recordLeftConflict(step.name, conflict.column, conflict.leftName)
        provenance.recordRightConflict(
          step.name,
          source.name,
          originalNames[conflict.column] ?? conflict.column,
          conflict.rightName
        )
        this.logger.warn(
          `Column '${conflict.column}' exists on both sides of the ${step.label} join`,
          { step: step.name, left: conflict.leftName, right: conflict.rightName }
        )
      }

      const columnsDropped = (step.dropAfter ?? []).filter((column) =>
        hasColumn(joined.table, column)
      )
      provenance.drop(columnsDropped)
      result = columnsDropped.length > 0 ? dropColumns(joined.table, columnsDropped) : joined.table
      steps.push({
        step: step.name,
        rowsBefore,
        rowsAfter: result.rows.length,
        matchedRows: joined.matchedRows,
        columnsAdded: Object.keys(joined.addedColumns),
        columnsDropped,
        conflicts: joined.conflicts,
      })
      this.logger.info(
        `After ${step.label} join: ${result.rows.length.toLocaleString('en-US')} rows`,
        { matched: joined.matchedRows }
      )
    }

    return { table: result, steps, provenance }
  }
}
