/**
 * Writes tables to disk as delimited files
 * @module io/table-writer
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import type { Table } from '../types/table.js'
import { serializeCsv, type CsvWriteOptions } from './csv.js'

export interface WriteResult {
  path: string
  bytesWritten: number
}

export interface TableWrite {
  path: string
  table: Table
}

interface StagedWrite {
  path: string
  tempPath: string
  buffer: Buffer
}

/**
 * Writes several tables as one unit. Every file is first written to a
 * temporary sibling; only when all of them are on disk are they renamed
 * into place. If any step fails, the temporary files and the targets
 * already renamed are removed, so either every file appears or none does.
 */
export async function writeTables(
  writes: readonly TableWrite[],
  options: CsvWriteOptions = {}
): Promise<WriteResult[]> {
  const staged: StagedWrite[] = writes.map(({ path, table }) => ({
    path,
    tempPath: `${path}.${process.pid}.tmp`,
    buffer: Buffer.from(serializeCsv(table, options), 'utf8'),
  }))
  const committed: string[] = []

  try {
    for (const entry of staged) {
      await mkdir(dirname(entry.path), { recursive: true })
      await writeFile(entry.tempPath, entry.buffer)
    }
    for (const entry of staged) {
      await rename(entry.tempPath, entry.path)
      committed.push(entry.path)
    }
  } catch (error) {
    await Promise.all([
      ...staged.map((entry) => rm(entry.tempPath, { force: true })),
      ...committed.map((path) => rm(path, { force: true })),
    ])
    throw error
  }

  return staged.map((entry) => ({ path: entry.path, bytesWritten: entry.buffer.byteLength }))
}

/**
 * Writes the table to `path`. The content goes to a temporary file next to
 * the target first and is renamed into place, so a failed write never
 * leaves a partial file at `path`.
 */
export async function writeTable(
  path: string,
  table: Table,
  options: CsvWriteOptions = {}
): Promise<WriteResult> {
  const [result] = await writeTables([{ path, table }], options)
  return result
}
