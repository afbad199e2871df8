/**
 * Ledgerwise - Sample profile for first-run demos and the "Load sample" button
 */

import type { FinancialProfile } from './types'

export function createSampleProfile(): FinancialProfile {
  return {
    income: 6500,
    period: 'monthly',
    fixedExpenses: 2400,
    variableExpenses: 1300,
    savings: 900,
    debts: [
      { label: 'Car loan', amount: 14000, rate: 0.065 },
      { label: 'Credit card', amount: 2500, rate: 0.22 },
    ],
    insuranceCoverage: 250000,
    age: 34,
    dependents: 2,
    emergencyFund: 8000,
    investments: 12000,
    goals: 'Build a six-month emergency fund and save for a home down payment',
  }
}

export function createEmptyProfile(): FinancialProfile {
  return {
    income: 0,
    period: 'monthly',
    fixedExpenses: 0,
    variableExpenses: 0,
    savings: 0,
    debts: [],
    insuranceCoverage: 0,
    age: 30,
    dependents: 0,
  }
}
