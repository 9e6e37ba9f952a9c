/**
 * Orchestrates a complete join run: load, prepare, join, resolve, write, report
 * @module core/claims-joiner
 */

import { v4 as uuidv4 } from 'uuid'

import type { Table } from '../types/table.js'
import type { SourceTables } from '../types/sources.js'
import type { ClaimsJoinConfig } from '../config/config.js'
import { loadSourceTables } from '../io/table-loader.js'
import { writeTables, type TableWrite, type WriteResult } from '../io/table-writer.js'
import {
  JoinPipeline,
  prepareJoinInputs,
  type JoinStepReport,
} from '../join/join-pipeline.js'
import type { JoinStep } from '../join/join-plan.js'
import { resolveCollisions, type DroppedColumn } from '../join/collision-resolver.js'
import type { ColumnProvenanceTracker } from '../join/column-provenance.js'
import { buildClaimsSummary } from '../report/claims-summary.js'
import { buildRunReport, formatRunReport, type RunReport } from '../report/run-report.js'
import { isClaimsJoinError } from '../utils/errors.js'
import {
  createPrefixedLogger,
  createSilentLogger,
  type Logger,
} from '../utils/logger.js'

export interface ClaimsJoinerOptions {
  logger?: Logger
  /** Overrides the join plan (default: the nine-step claims plan) */
  plan?: readonly JoinStep[]
}

/**
 * Joined table before it is written
 */
export interface JoinOutcome {
  table: Table
  steps: JoinStepReport[]
  dropped: DroppedColumn[]
  provenance: ColumnProvenanceTracker
}

export interface ClaimsJoinRunResult {
  report: RunReport
  table: Table
  output: WriteResult
  summary?: { table: Table; output: WriteResult }
}

/**
 * ClaimsJoiner - runs the full transformation from the generator's CSV
 * export to one transaction-level output file.
 *
 * A run is all-or-nothing: every input is loaded before any join, the
 * summary is built before anything is written, and the output files are
 * committed together, so a failed run leaves none of them behind.
 *
 * @example
 * ```typescript
 * const joiner = new ClaimsJoiner(resolveConfig({ dataDir: 'export/csv' }))
 * const { report } = await joiner.run()
 * ```
 */
export class ClaimsJoiner {
  private readonly config: ClaimsJoinConfig
  private readonly logger: Logger
  private readonly pipeline: JoinPipeline

  constructor(config: ClaimsJoinConfig, options: ClaimsJoinerOptions = {}) {
    this.config = config
    this.logger = options.logger ?? createSilentLogger()
    this.pipeline = new JoinPipeline({
      plan: options.plan,
      suffixes: config.conflictSuffixes,
      logger: createPrefixedLogger('join', this.logger),
    })
  }

  getConfig(): ClaimsJoinConfig {
    return { ...this.config }
  }

  /**
   * Loads every source table from the configured directory
   */
  async loadSources(): Promise<SourceTables> {
    return loadSourceTables(this.config.dataDir, {
      delimiter: this.config.delimiter,
      inferTypes: this.config.inferTypes,
      logger: createPrefixedLogger('load', this.logger),
    })
  }

  /**
   * Runs preparation, the join plan and collision cleanup in memory
   */
  join(sources: SourceTables): JoinOutcome {
    const inputs = prepareJoinInputs(sources, createPrefixedLogger('prepare', this.logger))
    const { table, steps, provenance } = this.pipeline.run(inputs)

    const resolution = resolveCollisions(table, {
      suffixes: this.config.conflictSuffixes,
      provenance,
    })
    for (const { column, origin } of resolution.dropped) {
      this.logger.warn(`Removed conflicting column '${column}'`, {
        step: origin && origin.kind !== 'root' ? origin.step : undefined,
      })
    }

    return { table: resolution.table, steps, dropped: resolution.dropped, provenance }
  }

  /**
   * Executes the whole run and writes the output file(s)
   */
  async run(): Promise<ClaimsJoinRunResult> {
    const runId = uuidv4()
    const startedAt = Date.now()
    this.logger.info('Starting claims join', {
      runId,
      dataDir: this.config.dataDir,
      outputFile: this.config.outputFile,
    })

    try {
      const sources = await this.loadSources()
      const outcome = this.join(sources)

      const summaryTable = this.config.summaryOutputFile
        ? buildClaimsSummary(sources)
        : undefined

      const writes: TableWrite[] = [{ path: this.config.outputFile, table: outcome.table }]
      if (this.config.summaryOutputFile && summaryTable) {
        writes.push({ path: this.config.summaryOutputFile, table: summaryTable })
      }
      const [output, summaryOutput] = await writeTables(writes, {
        delimiter: this.config.delimiter,
      })

      let summary: ClaimsJoinRunResult['summary']
      if (summaryTable && summaryOutput) {
        summary = { table: summaryTable, output: summaryOutput }
        this.logger.info(
          `Claims summary saved to ${summaryOutput.path}: ${summaryTable.rows.length.toLocaleString('en-US')} claims`
        )
      }

      const report = buildRunReport({
        runId,
        outputFile: output.path,
        table: outcome.table,
        fileSizeBytes: output.bytesWritten,
        steps: outcome.steps,
        droppedColumns: outcome.dropped,
        durationMs: Date.now() - startedAt,
      })
      for (const line of formatRunReport(report)) {
        this.logger.info(line)
      }

      return { report, table: outcome.table, output, summary }
    } catch (error) {
      this.logger.error('Claims join failed', {
        runId,
        code: isClaimsJoinError(error) ? error.code : undefined,
        message: error instanceof Error ? error.message : String(error),
      })
      throw error
    }
  }
}
