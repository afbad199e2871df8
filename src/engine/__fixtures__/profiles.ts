import type { FinancialProfile } from '../types'

/** $5,000 a month, no debt, no cover, one dependent */
export const starterProfile: FinancialProfile = {
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

/** Fully covered, no debt, a year of expenses in reserve */
export const strongProfile: FinancialProfile = {
  income: 10000,
  period: 'monthly',
  fixedExpenses: 3000,
  variableExpenses: 1000,
  savings: 3000,
  debts: [],
  insuranceCoverage: 600000,
  age: 40,
  dependents: 0,
  emergencyFund: 48000,
  investments: 50000,
}

/** Expensive high-rate debt, no reserve, no cover, two dependents */
export const stretchedProfile: FinancialProfile = {
  income: 4000,
  period: 'monthly',
  fixedExpenses: 2500,
  variableExpenses: 1000,
  savings: 200,
  debts: [{ label: 'Credit card', amount: 30000, rate: 0.24 }],
  insuranceCoverage: 0,
  age: 45,
  dependents: 2,
}
