import { describe, it, expect } from 'vitest'
import { categorizeColumns } from '../../../src/report/column-categories.js'

describe('categorizeColumns', () => {
  it('should group columns by category in category order', () => {
    const columns = [
      'ID',
      'CLAIMID',
      'CLAIM_PATIENTID',
      'ENCOUNTER_ID',
      'PATIENT_FIRST',
      'PROVIDER_NAME',
      'ORG_NAME',
      'ORGANIZATION',
      'PAYER',
      'PAYER_NAME',
      'PROCEDURE_CODES',
    ]

    expect(categorizeColumns(columns)).toEqual([
      { category: 'Transaction', columns: ['ID', 'CLAIMID'] },
      { category: 'Claim', columns: ['CLAIMID', 'CLAIM_PATIENTID'] },
      { category: 'Encounter', columns: ['ENCOUNTER_ID'] },
      { category: 'Patient', columns: ['CLAIM_PATIENTID', 'PATIENT_FIRST'] },
      { category: 'Provider', columns: ['PROVIDER_NAME'] },
      { category: 'Organization', columns: ['ORG_NAME'] },
      { category: 'Payer', columns: ['PAYER', 'PAYER_NAME'] },
      { category: 'Clinical', columns: ['PROCEDURE_CODES'] },
    ])
  })

  it('should match transaction columns by exact name only', () => {
    expect(categorizeColumns(['AMOUNT', 'AMOUNT_DUE', 'TRANSFERTYPE'])).toEqual([
      { category: 'Transaction', columns: ['AMOUNT', 'TRANSFERTYPE'] },
    ])
  })

  it('should omit categories without columns', () => {
    expect(categorizeColumns(['APPOINTMENTID'])).toEqual([
      { category: 'Encounter', columns: ['APPOINTMENTID'] },
    ])
    expect(categorizeColumns([])).toEqual([])
  })

  it('should accept custom rules', () => {
    expect(
      categorizeColumns(['A1', 'B1'], [{ name: 'Claim', contains: ['B'] }])
    ).toEqual([{ category: 'Claim', columns: ['B1'] }])
  })
})
