import { describe, it, expect, vi } from 'vitest'
import { ClaimsJoiner } from '../../../src/core/claims-joiner.js'
import { parseConfig } from '../../../src/config/config.js'
import { JOIN_PLAN } from '../../../src/join/join-plan.js'
import { createTable } from '../../../src/table/operations.js'
import type { Logger } from '../../../src/utils/logger.js'
import { createSourceTables } from '../../fixtures/claims-data.js'

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('ClaimsJoiner', () => {
  describe('join', () => {
    it('should return the joined table without collision columns', () => {
      const joiner = new ClaimsJoiner(parseConfig({}))

      const outcome = joiner.join(createSourceTables())

      expect(outcome.table.columns).toHaveLength(52)
      expect(outcome.table.rows).toHaveLength(5)
      expect(outcome.dropped).toEqual([])
      expect(outcome.steps).toHaveLength(9)
    })

    it('should drop both sides of a conflict and log where it came from', () => {
      const base = createSourceTables()
      const claims_transactions = createTable(
        'claims_transactions',
        [...base.claims_transactions.columns, 'STATUS1'],
        base.claims_transactions.rows
      )
      const logger = createMockLogger()
      const joiner = new ClaimsJoiner(parseConfig({}), { logger })

      const outcome = joiner.join({ ...base, claims_transactions })

      expect(outcome.table.columns).toHaveLength(51)
      expect(outcome.table.columns).not.toContain('STATUS1')
      expect(outcome.dropped.map((entry) => entry.column)).toEqual(['STATUS1_x', 'STATUS1_y'])
      expect(logger.warn).toHaveBeenCalledWith("Removed conflicting column 'STATUS1_x'", {
        step: 'claims',
      })
      expect(logger.warn).toHaveBeenCalledWith(
        "[join] Column 'STATUS1' exists on both sides of the claims join",
        { step: 'claims', left: 'STATUS1_x', right: 'STATUS1_y' }
      )
    })

    it('should use the configured conflict suffixes', () => {
      const base = createSourceTables()
      const claims_transactions = createTable(
        'claims_transactions',
        [...base.claims_transactions.columns, 'STATUS1'],
        base.claims_transactions.rows
      )
      const joiner = new ClaimsJoiner(parseConfig({ conflictSuffixes: ['_l', '_r'] }))

      const outcome = joiner.join({ ...base, claims_transactions })

      expect(outcome.dropped.map((entry) => entry.column)).toEqual(['STATUS1_l', 'STATUS1_r'])
    })

    it('should run a custom plan', () => {
      const joiner = new ClaimsJoiner(parseConfig({}), { plan: JOIN_PLAN.slice(0, 2) })

      const outcome = joiner.join(createSourceTables())

      expect(outcome.steps.map((step) => step.step)).toEqual(['claims', 'encounters'])
      expect(outcome.table.columns).toHaveLength(32)
    })

    it('should log preparation under its own stage', () => {
      const logger = createMockLogger()
      const joiner = new ClaimsJoiner(parseConfig({}), { logger })

      joiner.join(createSourceTables())

      expect(logger.info).toHaveBeenCalledWith(
        '[prepare] condition facts aggregated: 1 encounter groups',
        undefined
      )
      expect(logger.info).toHaveBeenCalledWith('[join] After payer join: 5 rows', { matched: 3 })
    })
  })

  it('should return a copy of its configuration', () => {
    const joiner = new ClaimsJoiner(parseConfig({ dataDir: '/in' }))

    const config = joiner.getConfig()
    config.dataDir = '/changed'

    expect(joiner.getConfig().dataDir).toBe('/in')
  })
})
