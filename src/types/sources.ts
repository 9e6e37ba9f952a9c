import type { Table } from './table.js'

/**
 * Names of the source tables exported by the record generator
 */
export type SourceName =
  | 'patients'
  | 'providers'
  | 'organizations'
  | 'payers'
  | 'encounters'
  | 'claims'
  | 'claims_transactions'
  | 'procedures'
  | 'conditions'
  | 'medications'

/**
 * Clinical fact sources. Absence or emptiness of these is a handled state.
 */
export type FactSourceName = Extract<SourceName, 'procedures' | 'conditions' | 'medications'>

export const SOURCE_NAMES: readonly SourceName[] = [
  'claims',
  'claims_transactions',
  'encounters',
  'patients',
  'providers',
  'organizations',
  'payers',
  'procedures',
  'conditions',
  'medications',
] as const

export const FACT_SOURCE_NAMES: readonly FactSourceName[] = [
  'procedures',
  'conditions',
  'medications',
] as const

/**
 * Fixed file name of every source under the configured data directory
 */
export const SOURCE_FILES: Readonly<Record<SourceName, string>> = {
  patients: 'patients.csv',
  providers: 'providers.csv',
  organizations: 'organizations.csv',
  payers: 'payers.csv',
  encounters: 'encounters.csv',
  claims: 'claims.csv',
  claims_transactions: 'claims_transactions.csv',
  procedures: 'procedures.csv',
  conditions: 'conditions.csv',
  medications: 'medications.csv',
}

const FACT_SOURCES: ReadonlySet<SourceName> = new Set<SourceName>(FACT_SOURCE_NAMES)

export function isFactSource(source: SourceName): source is FactSourceName {
  return FACT_SOURCES.has(source)
}

/**
 * All source tables of one run, keyed by source name
 */
export type SourceTables = Readonly<Record<SourceName, Table>>
