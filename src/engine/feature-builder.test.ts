import { describe, it, expect } from 'vitest'
import { buildFeatures, findInvalidFields } from './feature-builder'
import { ValidationError } from './errors'
import type { FinancialProfile } from './types'

const example: FinancialProfile = {
  income: 5000,
  period: 'monthly',
  fixedExpenses: 2000,
  variableExpenses: 1000,
  savings: 500,
  debts: [],
  insuranceCoverage: 0,
  age: 30,
  dependents: 1,
}

function expectValidationError(profile: FinancialProfile, fields: string[]) {
  try {
    buildFeatures(profile)
  } catch (e) {
    expect(e).toBeInstanceOf(ValidationError)
    if (e instanceof ValidationError) expect(e.fields).toEqual(fields)
    return
  }
  throw new Error('expected ValidationError')
}

describe('feature builder: reference profile', () => {
  it('derives savings rate, debt ratio and coverage ratio', () => {
    const f = buildFeatures(example)
    expect(f.savingsRate).toBeCloseTo(0.10, 10)
    expect(f.debtToIncome).toBe(0)
    expect(f.coverageRatio).toBe(0)
  })

  it('derives the supporting figures', () => {
    const f = buildFeatures(example)
    expect(f.expenseRatio).toBeCloseTo(0.6, 10)
    expect(f.fixedExpenseRatio).toBeCloseTo(0.4, 10)
    expect(f.weightedDebtRate).toBe(0)
    expect(f.annualIncome).toBe(60000)
    expect(f.monthlyIncome).toBe(5000)
    expect(f.monthlySurplus).toBe(1500)
    expect(f.requiredCoverage).toBe(450000)
    expect(f.emergencyMonths).toBe(0)
    expect(f.ageFactor).toBeCloseTo(12 / 49, 10)
    expect(f.dependents).toBe(1)
  })

  it('is deterministic', () => {
    expect(buildFeatures(example)).toEqual(buildFeatures(example))
  })
})

describe('feature builder: validation', () => {
  it('rejects zero income', () => {
    expectValidationError({ ...example, income: 0 }, ['income'])
  })

  it('lists every offending field in profile order', () => {
    expectValidationError(
      { ...example, income: -1, fixedExpenses: Number.NaN, debts: [{ amount: -5, rate: 0.1 }], age: Infinity },
      ['income', 'fixedExpenses', 'debts[0].amount', 'age'],
    )
  })

  it('rejects savings above income', () => {
    expectValidationError({ ...example, savings: 6000 }, ['savings'])
  })

  it('checks optional amounts only when present', () => {
    expect(findInvalidFields(example)).toEqual([])
    expect(findInvalidFields({ ...example, emergencyFund: -1, investments: 10 })).toEqual(['emergencyFund'])
  })
})

describe('feature builder: periods and debts', () => {
  const annual: FinancialProfile = {
    ...example,
    income: 60000,
    period: 'annual',
    fixedExpenses: 24000,
    variableExpenses: 12000,
    savings: 6000,
    debts: [{ amount: 30000, rate: 0.05 }, { amount: 10000, rate: 0.25 }],
  }

  it('annualizes and weights debt by balance', () => {
    const f = buildFeatures(annual)
    expect(f.monthlyIncome).toBeCloseTo(5000, 6)
    expect(f.savingsRate).toBeCloseTo(0.1, 10)
    expect(f.monthlySurplus).toBeCloseTo(1500, 6)
    expect(f.totalDebt).toBe(40000)
    expect(f.debtToIncome).toBeCloseTo(2 / 3, 10)
    expect(f.weightedDebtRate).toBeCloseTo(0.1, 10)
  })

  it('measures the emergency fund in months of expenses', () => {
    expect(buildFeatures({ ...example, emergencyFund: 9000 }).emergencyMonths).toBe(3)
    expect(buildFeatures({ ...example, emergencyFund: 1_000_000 }).emergencyMonths).toBe(24)
    expect(buildFeatures({ ...example, fixedExpenses: 0, variableExpenses: 0, emergencyFund: 10 }).emergencyMonths).toBe(24)
  })

  it('clamps the age factor to working years', () => {
    expect(buildFeatures({ ...example, age: 10 }).ageFactor).toBe(0)
    expect(buildFeatures({ ...example, age: 80 }).ageFactor).toBe(1)
  })
})

describe('feature builder: ranges', () => {
  it('keeps savings rate at most 1 and debt ratio non-negative', () => {
    for (let i = 1; i <= 40; i++) {
      const income = i * 250
      const f = buildFeatures({
        ...example,
        income,
        savings: (income * (i % 11)) / 10,
        debts: i % 3 === 0 ? [] : [{ amount: i * 900, rate: (i % 7) / 20 }],
        dependents: i % 5,
      })
      expect(f.savingsRate).toBeLessThanOrEqual(1)
      expect(f.debtToIncome).toBeGreaterThanOrEqual(0)
    }
  })
})
