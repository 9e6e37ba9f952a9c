/**
 * Descriptive statistics for a completed join run
 * @module report/run-report
 */

import type { Table } from '../types/table.js'
import type { JoinStepReport } from '../join/join-pipeline.js'
import type { DroppedColumn } from '../join/collision-resolver.js'
import { categorizeColumns, type ColumnCategoryCount } from './column-categories.js'

export interface RunReport {
  runId: string
  outputFile: string
  totalRows: number
  totalColumns: number
  fileSizeBytes: number
  categories: ColumnCategoryCount[]
  steps: JoinStepReport[]
  droppedColumns: DroppedColumn[]
  durationMs: number
}

export interface RunReportInput {
  runId: string
  outputFile: string
  table: Table
  fileSizeBytes: number
  steps?: JoinStepReport[]
  droppedColumns?: DroppedColumn[]
  durationMs?: number
}

export function buildRunReport(input: RunReportInput): RunReport {
  return {
    runId: input.runId,
    outputFile: input.outputFile,
    totalRows: input.table.rows.length,
    totalColumns: input.table.columns.length,
    fileSizeBytes: input.fileSizeBytes,
    categories: categorizeColumns(input.table.columns),
    steps: input.steps ?? [],
    droppedColumns: input.droppedColumns ?? [],
    durationMs: input.durationMs ?? 0,
  }
}

/**
 * Size in mebibytes with two decimals, e.g. `"1.50"`
 */
export function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2)
}

/**
 * Renders the report as printable lines
 */
export function formatRunReport(report: RunReport): string[] {
  const lines = [
    `Output file: ${report.outputFile}`,
    `Total rows: ${report.totalRows.toLocaleString('en-US')}`,
    `Total columns: ${report.totalColumns}`,
    `File size: ${formatMegabytes(report.fileSizeBytes)} MB`,
  ]

  if (report.droppedColumns.length > 0) {
    lines.push(`Removed ${report.droppedColumns.length} duplicate columns`)
  }

  lines.push('Column Categories:')
  for (const { category, columns } of report.categories) {
    lines.push(`  ${category}: ${columns.length} columns`)
  }
  return lines
}
