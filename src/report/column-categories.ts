/**
 * Column categorization of the joined output
 * @module report/column-categories
 */

export type ColumnCategoryName =
  | 'Transaction'
  | 'Claim'
  | 'Encounter'
  | 'Patient'
  | 'Provider'
  | 'Organization'
  | 'Payer'
  | 'Clinical'

/**
 * A category matches a column whose name contains any of `contains`
 * or equals any of `exact`.
 */
export interface ColumnCategoryRule {
  name: ColumnCategoryName
  contains: readonly string[]
  exact?: readonly string[]
}

/**
 * Categories are not exclusive: `CLAIM_PATIENTID` counts as both Claim and
 * Patient.
 */
export const COLUMN_CATEGORY_RULES: readonly ColumnCategoryRule[] = [
  {
    name: 'Transaction',
    contains: ['TRANS'],
    exact: ['ID', 'CLAIMID', 'TYPE', 'AMOUNT', 'PAYMENTS', 'ADJUSTMENTS'],
  },
  { name: 'Claim', contains: ['CLAIM', 'DIAGNOSIS', 'STATUS'] },
  { name: 'Encounter', contains: ['ENCOUNTER', 'APPOINTMENT'] },
  { name: 'Patient', contains: ['PATIENT'] },
  { name: 'Provider', contains: ['PROVIDER'] },
  { name: 'Organization', contains: ['ORG_'] },
  { name: 'Payer', contains: ['PAYER'] },
  { name: 'Clinical', contains: ['PROCEDURE', 'CONDITION', 'MEDICATION'] },
]

export interface ColumnCategoryCount {
  category: ColumnCategoryName
  columns: string[]
}

function matches(rule: ColumnCategoryRule, column: string): boolean {
  return (
    rule.contains.some((fragment) => column.includes(fragment)) ||
    (rule.exact ?? []).includes(column)
  )
}

/**
 * Groups columns by category, in rule order. Categories with no column
 * are omitted.
 */
export function categorizeColumns(
  columns: readonly string[],
  rules: readonly ColumnCategoryRule[] = COLUMN_CATEGORY_RULES
): ColumnCategoryCount[] {
  return rules
    .map((rule) => ({
      category: rule.name,
      columns: columns.filter((column) => matches(rule, column)),
    }))
    .filter((entry) => entry.columns.length > 0)
}
