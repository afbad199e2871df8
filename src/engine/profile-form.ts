/**
 * Ledgerwise - Profile Form Model
 *
 * The profile editor works on strings so partially typed values survive
 * re-renders. These helpers move between that form state and a validated
 * FinancialProfile. Interest rates are edited as percentages.
 */

import { validateProfile } from './validation'
import type { FieldIssue, ValidationResult } from './validation'
import type { FinancialProfile, IncomePeriod } from './types'

export interface DebtRow {
  label: string
  amount: string
  /** Annual rate in percent, e.g. "18" for 18% */
  ratePercent: string
}

export interface ProfileForm {
  income: string
  period: IncomePeriod
  fixedExpenses: string
  variableExpenses: string
  savings: string
  insuranceCoverage: string
  age: string
  dependents: string
  emergencyFund: string
  investments: string
  goals: string
  debts: DebtRow[]
}

export type NumericField = Exclude<keyof ProfileForm, 'period' | 'goals' | 'debts'>

const OPTIONAL_FIELDS = new Set<NumericField>(['emergencyFund', 'investments'])

const NUMERIC_FIELDS: NumericField[] = [
  'income', 'fixedExpenses', 'variableExpenses', 'savings',
  'insuranceCoverage', 'age', 'dependents', 'emergencyFund', 'investments',
]

/** "12,500" and "$12500" both read as 12500; blank reads as undefined */
export function parseAmount(raw: string): number | undefined {
  const cleaned = raw.replace(/[$,\s]/g, '')
  if (!cleaned) return undefined
  return Number(cleaned)
}

const optionalText = (n: number | undefined) => (n === undefined ? '' : String(n))

export function emptyDebtRow(): DebtRow {
  return { label: '', amount: '', ratePercent: '' }
}

export function profileToForm(profile: FinancialProfile): ProfileForm {
  return {
    income: String(profile.income),
    period: profile.period,
    fixedExpenses: String(profile.fixedExpenses),
    variableExpenses: String(profile.variableExpenses),
    savings: String(profile.savings),
    insuranceCoverage: String(profile.insuranceCoverage),
    age: String(profile.age),
    dependents: String(profile.dependents),
    emergencyFund: optionalText(profile.emergencyFund),
    investments: optionalText(profile.investments),
    goals: profile.goals ?? '',
    debts: profile.debts.map(d => ({
      label: d.label ?? '',
      amount: String(d.amount),
      ratePercent: String(Math.round(d.rate * 10000) / 100),
    })),
  }
}

/** Every debt row is kept so error paths line up with the rows on screen */
export function readProfileForm(form: ProfileForm): ValidationResult<FinancialProfile> {
  const draft: Record<string, unknown> = { period: form.period }

  for (const field of NUMERIC_FIELDS) {
    const value = parseAmount(form[field])
    if (value === undefined && OPTIONAL_FIELDS.has(field)) continue
    draft[field] = value
  }

  const goals = form.goals.trim()
  if (goals) draft.goals = goals

  draft.debts = form.debts.map(row => {
    const rate = parseAmount(row.ratePercent)
    const label = row.label.trim()
    return {
      ...(label ? { label } : {}),
      amount: parseAmount(row.amount),
      rate: rate === undefined ? 0 : rate / 100,
    }
  })

  return validateProfile(draft)
}

/** First message per field path, for inline display */
export function issuesByField(issues: FieldIssue[]): Record<string, string> {
  const out: Record<string, string> = {}
  for (const issue of issues) {
    const key = issue.path || 'profile'
    if (!(key in out)) out[key] = issue.message
  }
  return out
}
