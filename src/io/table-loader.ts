/**
 * Table loader for the generator's CSV export directory
 * @module io/table-loader
 */

import { readFile, stat } from 'node:fs/promises'
import { join } from 'node:path'

import type { Table } from '../types/table.js'
import type { SourceName, SourceTables } from '../types/sources.js'
import { SOURCE_FILES, SOURCE_NAMES, isFactSource } from '../types/sources.js'
import { createTable } from '../table/operations.js'
import { MissingInputError } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { parseCsv } from './csv.js'

export interface LoadOptions {
  delimiter?: string
  inferTypes?: boolean
  logger?: Logger
}

async function fileExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path)
    return info.isFile()
  } catch (error) {
    if (isNotFound(error)) {
      return false
    }
    throw error
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

/**
 * Loads one source table fully into memory.
 *
 * @throws {MissingInputError} If the backing file does not exist
 */
export async function loadTable(
  dataDir: string,
  source: SourceName,
  options: LoadOptions = {}
): Promise<Table> {
  const logger = options.logger ?? createSilentLogger()
  const fileName = SOURCE_FILES[source]
  const path = join(dataDir, fileName)

  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFound(error)) {
      throw new MissingInputError([fileName], dataDir)
    }
    throw error
  }

  const table = parseCsv(source, content, {
    delimiter: options.delimiter,
    inferTypes: options.inferTypes,
  })
  logger.info(
    `Loaded ${fileName}: ${table.rows.length.toLocaleString('en-US')} rows, ${table.columns.length} columns`
  )
  return table
}

/**
 * Loads every source table of a run. Loading is all-or-nothing: every
 * missing required file is reported in a single {@link MissingInputError}
 * before any file is parsed. Missing clinical fact files load as empty tables.
 */
export async function loadSourceTables(
  dataDir: string,
  options: LoadOptions = {}
): Promise<SourceTables> {
  const logger = options.logger ?? createSilentLogger()

  const presence = await Promise.all(
    SOURCE_NAMES.map(async (source) => ({
      source,
      exists: await fileExists(join(dataDir, SOURCE_FILES[source])),
    }))
  )

  const missingRequired = presence
    .filter(({ source, exists }) => !exists && !isFactSource(source))
    .map(({ source }) => SOURCE_FILES[source])
  if (missingRequired.length > 0) {
    throw new MissingInputError(missingRequired, dataDir)
  }

  const tables: Partial<Record<SourceName, Table>> = {}
  for (const { source, exists } of presence) {
    if (!exists) {
      logger.warn(`${SOURCE_FILES[source]} not found; treating as empty`)
      tables[source] = createTable(source, [])
      continue
    }
    tables[source] = await loadTable(dataDir, source, options)
  }

  return {
    patients: requireLoaded(tables, 'patients'),
    providers: requireLoaded(tables, 'providers'),
    organizations: requireLoaded(tables, 'organizations'),
    payers: requireLoaded(tables, 'payers'),
    encounters: requireLoaded(tables, 'encounters'),
    claims: requireLoaded(tables, 'claims'),
    claims_transactions: requireLoaded(tables, 'claims_transactions'),
    procedures: requireLoaded(tables, 'procedures'),
    conditions: requireLoaded(tables, 'conditions'),
    medications: requireLoaded(tables, 'medications'),
  }
}

function requireLoaded(
  tables: Partial<Record<SourceName, Table>>,
  source: SourceName
): Table {
  const table = tables[source]
  if (!table) {
    throw new MissingInputError([SOURCE_FILES[source]], 'loaded tables')
  }
  return table
}
