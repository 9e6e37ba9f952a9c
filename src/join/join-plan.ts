/**
 * Declarative, ordered join plan for the claim transaction table
 * @module join/join-plan
 */

import type { Table } from '../types/table.js'
import { FACT_GROUP_KEYS } from '../transform/fact-aggregator.js'
import { DIMENSION_KEY_COLUMN } from '../transform/namespacer.js'

/**
 * Tables a join run consumes. Dimensions are expected namespaced and
 * fact tables aggregated (see `prepareJoinInputs`).
 */
export interface JoinInputs {
  transactions: Table
  claims: Table
  encounters: Table
  patients: Table
  providers: Table
  organizations: Table
  payers: Table
  procedures: Table
  conditions: Table
  medications: Table
}

export type JoinInputName = Exclude<keyof JoinInputs, 'transactions'>

/**
 * One step of the plan. Each step joins a right-hand input onto the
 * growing result, never onto the original transaction table.
 */
export interface JoinStep {
  /** Step identifier used in logs, errors and column provenance */
  name: string
  /** Human-readable label for progress lines */
  label: string
  right: JoinInputName
  /** Renames applied to the right-hand table before joining */
  rename?: Readonly<Record<string, string>>
  /** Key columns on the growing result */
  leftKeys: readonly string[]
  /** Key columns on the (renamed) right-hand table; must be unique */
  rightKeys: readonly string[]
  /** Leave the right-hand key columns out of the result */
  dropRightKeys: boolean
  /** Helper columns removed from the result once the step has run */
  dropAfter?: readonly string[]
}

export const CLAIM_RENAMES: Readonly<Record<string, string>> = {
  Id: 'CLAIM_ID',
  PATIENTID: 'CLAIM_PATIENTID',
  PROVIDERID: 'CLAIM_PROVIDERID',
  DEPARTMENTID: 'CLAIM_DEPARTMENTID',
  APPOINTMENTID: 'CLAIM_APPOINTMENTID',
  SUPERVISINGPROVIDERID: 'CLAIM_SUPERVISINGPROVIDERID',
}

export const ENCOUNTER_RENAMES: Readonly<Record<string, string>> = {
  Id: 'ENCOUNTER_ID',
  START: 'ENCOUNTER_START',
  STOP: 'ENCOUNTER_STOP',
  CODE: 'ENCOUNTER_CODE',
  DESCRIPTION: 'ENCOUNTER_DESCRIPTION',
  REASONCODE: 'ENCOUNTER_REASONCODE',
  REASONDESCRIPTION: 'ENCOUNTER_REASONDESCRIPTION',
}

/** Composite key of the growing result matched against fact aggregates */
const VISIT_KEYS: readonly string[] = ['CLAIM_PATIENTID', 'ENCOUNTER_ID']

/** Visit helper columns; the encounter's own `PATIENT` goes with them */
const VISIT_HELPER_COLUMNS: readonly string[] = FACT_GROUP_KEYS

/**
 * The nine joins, in execution order.
 *
 * The claim join comes first because the encounter reference lives on the
 * claim. The provider join uses the transaction's `PROVIDERID`; the claim's
 * `CLAIM_PROVIDERID` and `CLAIM_SUPERVISINGPROVIDERID` are kept but not
 * joined. The fact joins remove `PATIENT` and `ENCOUNTER` after they run.
 */
export const JOIN_PLAN: readonly JoinStep[] = [
  {
    name: 'claims',
    label: 'claims',
    right: 'claims',
    rename: CLAIM_RENAMES,
    leftKeys: ['CLAIMID'],
    rightKeys: ['CLAIM_ID'],
    dropRightKeys: false,
  },
  {
    name: 'encounters',
    label: 'encounter',
    right: 'encounters',
    rename: ENCOUNTER_RENAMES,
    leftKeys: ['CLAIM_APPOINTMENTID'],
    rightKeys: ['ENCOUNTER_ID'],
    dropRightKeys: false,
  },
  {
    name: 'patients',
    label: 'patient',
    right: 'patients',
    leftKeys: ['CLAIM_PATIENTID'],
    rightKeys: [DIMENSION_KEY_COLUMN],
    dropRightKeys: true,
  },
  {
    name: 'providers',
    label: 'provider',
    right: 'providers',
    leftKeys: ['PROVIDERID'],
    rightKeys: [DIMENSION_KEY_COLUMN],
    dropRightKeys: true,
  },
  {
    name: 'organizations',
    label: 'organization',
    right: 'organizations',
    leftKeys: ['ORGANIZATION'],
    rightKeys: [DIMENSION_KEY_COLUMN],
    dropRightKeys: true,
  },
  {
    name: 'payers',
    label: 'payer',
    right: 'payers',
    leftKeys: ['PAYER'],
    rightKeys: [DIMENSION_KEY_COLUMN],
    dropRightKeys: true,
  },
  {
    name: 'procedures',
    label: 'procedures',
    right: 'procedures',
    leftKeys: VISIT_KEYS,
    rightKeys: FACT_GROUP_KEYS,
    dropRightKeys: true,
    dropAfter: VISIT_HELPER_COLUMNS,
  },
  {
    name: 'conditions',
    label: 'conditions',
    right: 'conditions',
    leftKeys: VISIT_KEYS,
    rightKeys: FACT_GROUP_KEYS,
    dropRightKeys: true,
    dropAfter: VISIT_HELPER_COLUMNS,
  },
  {
    name: 'medications',
    label: 'medications',
    right: 'medications',
    leftKeys: VISIT_KEYS,
    rightKeys: FACT_GROUP_KEYS,
    dropRightKeys: true,
    dropAfter: VISIT_HELPER_COLUMNS,
  },
]
