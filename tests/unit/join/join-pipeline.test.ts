import { describe, it, expect, vi } from 'vitest'
import { JoinPipeline, prepareJoinInputs } from '../../../src/join/join-pipeline.js'
import { JOIN_PLAN } from '../../../src/join/join-plan.js'
import { createTable, dropColumns } from '../../../src/table/operations.js'
import { KeyCardinalityViolation, SchemaMismatchError } from '../../../src/utils/errors.js'
import type { Logger } from '../../../src/utils/logger.js'
import type { SourceTables } from '../../../src/types/sources.js'
import { createSourceTables } from '../../fixtures/claims-data.js'

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

function findRow(rows: readonly Record<string, unknown>[], id: string) {
  const row = rows.find((candidate) => candidate.ID === id)
  if (!row) throw new Error(`No row with ID ${id}`)
  return row
}

describe('prepareJoinInputs', () => {
  it('should namespace dimensions and aggregate clinical facts', () => {
    const inputs = prepareJoinInputs(createSourceTables())

    expect(inputs.transactions.name).toBe('claims_transactions')
    expect(inputs.payers.columns).toEqual(['Id', 'PAYER_NAME', 'PAYER_CITY'])
    expect(inputs.procedures.rows).toEqual([
      {
        PATIENT: 'P1',
        ENCOUNTER: 'E1',
        PROCEDURE_CODES: '430193006|710824005',
        PROCEDURE_DESCRIPTIONS: 'Medication reconciliation|Health assessment',
      },
    ])
    expect(inputs.medications.columns).toEqual([
      'PATIENT',
      'ENCOUNTER',
      'MEDICATION_CODES',
      'MEDICATION_DESCRIPTIONS',
    ])
  })

  it('should log the group count of every fact table', () => {
    const logger = createMockLogger()

    prepareJoinInputs(createSourceTables(), logger)

    expect(logger.info).toHaveBeenCalledWith('procedure facts aggregated: 1 encounter groups')
    expect(logger.info).toHaveBeenCalledWith('medication facts aggregated: 0 encounter groups')
  })
})

describe('JoinPipeline', () => {
  const run = (overrides: Partial<SourceTables> = {}, logger?: Logger) =>
    new JoinPipeline({ logger }).run(prepareJoinInputs(createSourceTables(overrides)))

  it('should use the nine-step plan by default', () => {
    expect(new JoinPipeline().getPlan()).toBe(JOIN_PLAN)
    expect(JOIN_PLAN.map((step) => step.name)).toEqual([
      'claims',
      'encounters',
      'patients',
      'providers',
      'organizations',
      'payers',
      'procedures',
      'conditions',
      'medications',
    ])
  })

  it('should keep exactly one row per transaction in input order', () => {
    const { table, steps } = run()

    expect(table.name).toBe('joined')
    expect(table.rows.map((row) => row.ID)).toEqual(['T1', 'T2', 'T3', 'T4', 'T5'])
    for (const step of steps) {
      expect(step.rowsBefore).toBe(5)
      expect(step.rowsAfter).toBe(5)
    }
  })

  it('should add every namespaced column without conflicts', () => {
    const { table, steps } = run()

    expect(table.columns).toHaveLength(52)
    expect(steps.flatMap((step) => step.conflicts)).toEqual([])
    expect(table.columns.slice(11, 20)).toEqual([
      'CLAIM_ID',
      'CLAIM_PATIENTID',
      'CLAIM_PROVIDERID',
      'PRIMARYPATIENTINSURANCEID',
      'CLAIM_DEPARTMENTID',
      'DIAGNOSIS1',
      'CLAIM_APPOINTMENTID',
      'CLAIM_SUPERVISINGPROVIDERID',
      'STATUS1',
    ])
    expect(table.columns.slice(-6)).toEqual([
      'PROCEDURE_CODES',
      'PROCEDURE_DESCRIPTIONS',
      'CONDITION_CODES',
      'CONDITION_DESCRIPTIONS',
      'MEDICATION_CODES',
      'MEDICATION_DESCRIPTIONS',
    ])
  })

  it('should count the matched rows of every step', () => {
    const { steps } = run()

    expect(steps.map((step) => [step.step, step.matchedRows])).toEqual([
      ['claims', 4],
      ['encounters', 3],
      ['patients', 4],
      ['providers', 5],
      ['organizations', 3],
      ['payers', 3],
      ['procedures', 2],
      ['conditions', 1],
      ['medications', 0],
    ])
  })

  it('should remove the visit helper columns after the first fact join', () => {
    const { table, steps, provenance } = run()

    expect(table.columns).not.toContain('PATIENT')
    expect(table.columns).not.toContain('ENCOUNTER')
    expect(steps.map((step) => [step.step, step.columnsDropped])).toEqual([
      ['claims', []],
      ['encounters', []],
      ['patients', []],
      ['providers', []],
      ['organizations', []],
      ['payers', []],
      ['procedures', ['PATIENT']],
      ['conditions', []],
      ['medications', []],
    ])
    expect(provenance.get('PATIENT')).toBeUndefined()
  })

  it('should keep the encounter patient when no fact step runs', () => {
    const pipeline = new JoinPipeline({ plan: JOIN_PLAN.slice(0, 2) })

    const { table } = pipeline.run(prepareJoinInputs(createSourceTables()))

    expect(findRow(table.rows, 'T1').PATIENT).toBe('P1')
  })

  it('should widen a fully matched transaction with all context', () => {
    const row = findRow(run().table.rows, 'T1')

    expect(row).toMatchObject({
      CLAIM_ID: 'C1',
      ENCOUNTER_ID: 'E1',
      ENCOUNTER_CODE: 410620009,
      PATIENT_FIRST: 'Ana',
      PROVIDER_NAME: 'Dr. Lee',
      ORG_NAME: 'Harbor Clinic',
      PAYER_NAME: 'Acme Health',
      PROCEDURE_CODES: '430193006|710824005',
      CONDITION_CODES: null,
      MEDICATION_CODES: null,
    })
  })

  it('should carry conditions and a null payer attribute', () => {
    const row = findRow(run().table.rows, 'T3')

    expect(row).toMatchObject({
      CONDITION_CODES: '444814009',
      CONDITION_DESCRIPTIONS: 'Viral sinusitis',
      PROCEDURE_CODES: null,
      PAYER_NAME: 'NO_INSURANCE',
      PAYER_CITY: null,
    })
  })

  it('should leave encounter context null when the claim points at an unknown encounter', () => {
    const row = findRow(run().table.rows, 'T4')

    expect(row).toMatchObject({
      CLAIM_ID: 'C3',
      CLAIM_APPOINTMENTID: 'E9',
      ENCOUNTER_ID: null,
      ENCOUNTER_START: null,
      ORGANIZATION: null,
      ORG_NAME: null,
      PAYER: null,
      PAYER_NAME: null,
      PROCEDURE_CODES: null,
      PATIENT_FIRST: 'Ana',
    })
  })

  it('should join the provider on the transaction, not the claim', () => {
    const row = findRow(run().table.rows, 'T4')

    expect(row.PROVIDERID).toBe('PR2')
    expect(row.CLAIM_PROVIDERID).toBe('PR1')
    expect(row.PROVIDER_NAME).toBe('Dr. Cruz')
  })

  it('should keep a transaction whose claim does not exist', () => {
    const row = findRow(run().table.rows, 'T5')

    expect(row).toMatchObject({
      CLAIM_ID: null,
      CLAIM_PATIENTID: null,
      PATIENT_FIRST: null,
      ENCOUNTER_ID: null,
      PROVIDER_NAME: 'Dr. Lee',
    })
  })

  it('should fail on a duplicated provider id before the provider join', () => {
    const providers = createTable('providers', ['Id', 'NAME'], [
      { Id: 'PR1', NAME: 'Dr. Lee' },
      { Id: 'PR1', NAME: 'Dr. Lee' },
    ])

    const error = (() => {
      try {
        run({ providers })
      } catch (caught) {
        return caught
      }
      return undefined
    })()

    expect(error).toBeInstanceOf(KeyCardinalityViolation)
    expect(error).toMatchObject({
      table: 'providers',
      duplicateKey: ['PR1'],
      occurrences: 2,
      context: expect.objectContaining({ step: 'providers' }),
    })
  })

  it('should fail when a step key column is missing', () => {
    const base = createSourceTables()
    const transactions = dropColumns(base.claims_transactions, ['PROVIDERID'])

    expect(() => run({ claims_transactions: transactions })).toThrow(SchemaMismatchError)
    expect(() => run({ claims_transactions: transactions })).toThrow(
      "Table 'joined' is missing required column(s) (step 'providers'): PROVIDERID"
    )
  })

  it('should log row counts after each step', () => {
    const logger = createMockLogger()

    run({}, logger)

    expect(logger.info).toHaveBeenCalledWith('After claims join: 5 rows', { matched: 4 })
    expect(logger.info).toHaveBeenCalledWith('After medications join: 5 rows', { matched: 0 })
  })

  it('should suffix and record a name both sides of a step contribute', () => {
    const base = createSourceTables()
    const transactions = createTable(
      'claims_transactions',
      [...base.claims_transactions.columns, 'STATUS1'],
      base.claims_transactions.rows.map((row) => ({ ...row, STATUS1: 'POSTED' }))
    )
    const logger = createMockLogger()

    const { table, steps, provenance } = run({ claims_transactions: transactions }, logger)

    expect(table.columns).toContain('STATUS1_x')
    expect(table.columns).toContain('STATUS1_y')
    expect(steps[0].conflicts).toEqual([
      { column: 'STATUS1', leftName: 'STATUS1_x', rightName: 'STATUS1_y' },
    ])
    expect(findRow(table.rows, 'T1')).toMatchObject({ STATUS1_x: 'POSTED', STATUS1_y: 'CLOSED' })
    expect(provenance.get('STATUS1_x')).toEqual({
      kind: 'conflict',
      step: 'claims',
      side: 'left',
      source: 'claims_transactions',
      sourceColumn: 'STATUS1',
    })
    expect(provenance.get('STATUS1_y')).toEqual({
      kind: 'conflict',
      step: 'claims',
      side: 'right',
      source: 'claims',
      sourceColumn: 'STATUS1',
    })
    expect(logger.warn).toHaveBeenCalledWith(
      "Column 'STATUS1' exists on both sides of the claims join",
      { step: 'claims', left: 'STATUS1_x', right: 'STATUS1_y' }
    )
  })

  it('should record where every added column came from', () => {
    const { provenance } = run()

    expect(provenance.get('ID')).toEqual({
      kind: 'root',
      source: 'claims_transactions',
      sourceColumn: 'ID',
    })
    expect(provenance.get('CLAIM_ID')).toEqual({
      kind: 'joined',
      step: 'claims',
      source: 'claims',
      sourceColumn: 'Id',
    })
    expect(provenance.get('ENCOUNTER_START')).toEqual({
      kind: 'joined',
      step: 'encounters',
      source: 'encounters',
      sourceColumn: 'START',
    })
    expect(provenance.get('PATIENT_FIRST')).toMatchObject({ step: 'patients' })
    expect(provenance.conflictColumns()).toEqual([])
  })

  it('should run a custom plan', () => {
    const pipeline = new JoinPipeline({ plan: JOIN_PLAN.slice(0, 1) })

    const { table, steps } = pipeline.run(prepareJoinInputs(createSourceTables()))

    expect(steps).toHaveLength(1)
    expect(table.columns).toHaveLength(20)
  })
})
