// Main entry point
export { ClaimsJoinBuilder, createClaimsJoinBuilder } from './builder/claims-join-builder.js'
export {
  ClaimsJoiner,
  type ClaimsJoinerOptions,
  type ClaimsJoinRunResult,
  type JoinOutcome,
} from './core/claims-joiner.js'

// Configuration
export {
  claimsJoinConfigSchema,
  parseConfig,
  resolveConfig,
  loadConfigFromEnv,
  DEFAULT_DATA_DIR,
  DEFAULT_OUTPUT_FILE,
  type ClaimsJoinConfig,
  type ClaimsJoinConfigInput,
} from './config/config.js'

// Types - Tables
export type { CellValue, Row, Table, ColumnType } from './types/table.js'
export type { SourceName, FactSourceName, SourceTables } from './types/sources.js'
export { SOURCE_FILES, SOURCE_NAMES, FACT_SOURCE_NAMES, isFactSource } from './types/sources.js'

// Table operations
export {
  createTable,
  renameColumns,
  dropColumns,
  selectColumns,
  columnValues,
  requireColumns,
  hasColumn,
  isMissing,
} from './table/operations.js'

// Input / output
export {
  parseCsv,
  parseCsvText,
  serializeCsv,
  inferColumnType,
  type CsvParseOptions,
  type CsvWriteOptions,
} from './io/csv.js'
export { loadTable, loadSourceTables, type LoadOptions } from './io/table-loader.js'
export {
  writeTable,
  writeTables,
  type TableWrite,
  type WriteResult,
} from './io/table-writer.js'

// Transforms
export {
  namespaceTable,
  namespaceDimension,
  findSharedColumns,
  DIMENSION_PREFIXES,
  DIMENSION_KEY_COLUMN,
  type DimensionName,
  type NamespaceOptions,
} from './transform/namespacer.js'
export {
  aggregateFacts,
  aggregateColumnNames,
  LIST_SEPARATOR,
  FACT_GROUP_KEYS,
  type FactKind,
  type AggregateOptions,
} from './transform/fact-aggregator.js'

// Joins
export {
  leftJoin,
  assertUniqueKey,
  DEFAULT_CONFLICT_SUFFIXES,
  type LeftJoinOptions,
  type LeftJoinResult,
  type JoinConflict,
} from './join/left-join.js'
export {
  JOIN_PLAN,
  CLAIM_RENAMES,
  ENCOUNTER_RENAMES,
  type JoinStep,
  type JoinInputs,
  type JoinInputName,
} from './join/join-plan.js'
export {
  JoinPipeline,
  prepareJoinInputs,
  type JoinPipelineOptions,
  type JoinPipelineResult,
  type JoinStepReport,
} from './join/join-pipeline.js'
export { ColumnProvenanceTracker, type ColumnOrigin } from './join/column-provenance.js'
export {
  resolveCollisions,
  findCollisionColumns,
  type CollisionResolution,
  type DroppedColumn,
} from './join/collision-resolver.js'

// Reporting
export {
  categorizeColumns,
  COLUMN_CATEGORY_RULES,
  type ColumnCategoryName,
  type ColumnCategoryRule,
  type ColumnCategoryCount,
} from './report/column-categories.js'
export {
  buildRunReport,
  formatRunReport,
  formatMegabytes,
  type RunReport,
} from './report/run-report.js'
export {
  buildClaimsSummary,
  previewRows,
  formatTable,
  DEFAULT_PREVIEW_COLUMNS,
} from './report/claims-summary.js'

// Logging
export {
  defaultLogger,
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './utils/logger.js'

// Errors
export {
  ClaimsJoinError,
  MissingInputError,
  SchemaMismatchError,
  KeyCardinalityViolation,
  CsvParseError,
  ConfigurationError,
  MissingParameterError,
  InvalidParameterError,
  isClaimsJoinError,
} from './utils/errors.js'
