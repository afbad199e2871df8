/**
 * Ledgerwise - Feature Builder
 *
 * Derives the ratios that scoring, insights and the advisor work from.
 * Pure: the same profile always yields the same features, nothing is cached.
 */

import { ValidationError } from './errors'
import type { DerivedFeatures, FinancialProfile } from './types'

// ─── Constants ────────────────────────────────────────────────────────────

/** Years of annual income a household needs covered, before dependents */
export const COVERAGE_BASE_YEARS = 5
export const COVERAGE_YEARS_PER_DEPENDENT = 2.5

export const WORKING_AGE_START = 18
export const RETIREMENT_AGE = 67

export const EMERGENCY_MONTHS_CAP = 24

export function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value))
}

// ─── Validation ───────────────────────────────────────────────────────────

function isNonNegative(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
}

/** Field names that fail the numeric checks, in profile order */
export function findInvalidFields(profile: FinancialProfile): string[] {
  const bad: string[] = []

  if (!isNonNegative(profile.income) || profile.income === 0) bad.push('income')
  if (!isNonNegative(profile.fixedExpenses)) bad.push('fixedExpenses')
  if (!isNonNegative(profile.variableExpenses)) bad.push('variableExpenses')
  if (!isNonNegative(profile.savings)) bad.push('savings')
  else if (isNonNegative(profile.income) && profile.savings > profile.income) bad.push('savings')

  if (!Array.isArray(profile.debts)) {
    bad.push('debts')
  } else {
    profile.debts.forEach((d, i) => {
      if (!isNonNegative(d.amount)) bad.push(`debts[${i}].amount`)
      if (!isNonNegative(d.rate)) bad.push(`debts[${i}].rate`)
    })
  }

  if (!isNonNegative(profile.insuranceCoverage)) bad.push('insuranceCoverage')
  if (!isNonNegative(profile.age)) bad.push('age')
  if (!isNonNegative(profile.dependents)) bad.push('dependents')
  if (profile.emergencyFund !== undefined && !isNonNegative(profile.emergencyFund)) bad.push('emergencyFund')
  if (profile.investments !== undefined && !isNonNegative(profile.investments)) bad.push('investments')

  return bad
}

// ─── Builder ──────────────────────────────────────────────────────────────

export function buildFeatures(profile: FinancialProfile): DerivedFeatures {
  const invalid = findInvalidFields(profile)
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid profile fields: ${invalid.join(', ')}`, invalid)
  }

  const perMonth = profile.period === 'annual' ? 1 / 12 : 1
  const monthlyIncome = profile.income * perMonth
  const annualIncome = monthlyIncome * 12
  const expenses = profile.fixedExpenses + profile.variableExpenses
  const monthlyExpenses = expenses * perMonth

  const totalDebt = profile.debts.reduce((sum, d) => sum + d.amount, 0)
  const weightedDebtRate = totalDebt > 0
    ? profile.debts.reduce((sum, d) => sum + d.amount * d.rate, 0) / totalDebt
    : 0

  const requiredCoverage = annualIncome * (COVERAGE_BASE_YEARS + COVERAGE_YEARS_PER_DEPENDENT * profile.dependents)

  const fund = profile.emergencyFund ?? 0
  let emergencyMonths = 0
  if (fund > 0) {
    emergencyMonths = monthlyExpenses > 0
      ? Math.min(EMERGENCY_MONTHS_CAP, fund / monthlyExpenses)
      : EMERGENCY_MONTHS_CAP
  }

  return {
    savingsRate: profile.savings / profile.income,
    debtToIncome: totalDebt / annualIncome,
    coverageRatio: profile.insuranceCoverage / requiredCoverage,
    expenseRatio: expenses / profile.income,
    fixedExpenseRatio: profile.fixedExpenses / profile.income,
    weightedDebtRate,
    emergencyMonths,
    ageFactor: clamp((profile.age - WORKING_AGE_START) / (RETIREMENT_AGE - WORKING_AGE_START)),
    dependents: profile.dependents,
    monthlyIncome,
    annualIncome,
    monthlySurplus: (profile.income - expenses - profile.savings) * perMonth,
    totalDebt,
    requiredCoverage,
  }
}
