/**
 * Ledgerwise - Core Types
 * Shared data model for the profile, derived features, scores and advisory history.
 */

// ─── Profile ──────────────────────────────────────────────────────────────

/** Period that income, expenses and savings are expressed in */
export type IncomePeriod = 'monthly' | 'annual'

export interface Debt {
  label?: string
  amount: number
  /** Annual interest rate as a fraction (0.18 = 18%) */
  rate: number
}

export interface FinancialProfile {
  income: number
  period: IncomePeriod
  fixedExpenses: number
  variableExpenses: number
  /** Amount saved each period */
  savings: number
  debts: Debt[]
  insuranceCoverage: number
  age: number
  dependents: number
  emergencyFund?: number
  investments?: number
  goals?: string
}

// ─── Derived ──────────────────────────────────────────────────────────────

export interface DerivedFeatures {
  savingsRate: number
  debtToIncome: number
  coverageRatio: number
  expenseRatio: number
  fixedExpenseRatio: number
  weightedDebtRate: number
  emergencyMonths: number
  ageFactor: number
  dependents: number
  monthlyIncome: number
  annualIncome: number
  monthlySurplus: number
  totalDebt: number
  requiredCoverage: number
}

export interface ScoreResult {
  riskScore: number
  investmentReadiness: number
  insuranceGap: number
  modelVersion: number
}

// ─── Models ───────────────────────────────────────────────────────────────

export const FEATURE_NAMES = [
  'savings', 'debt', 'debtRate', 'coverage', 'expenses', 'age', 'dependents',
] as const

export type FeatureName = typeof FEATURE_NAMES[number]

export interface LinearModel {
  intercept: number
  weights: number[]
}

export interface TrainingMetrics {
  samples: number
  riskMse: number
  readinessMse: number
}

export interface ModelArtifact {
  version: number
  kind: 'baseline' | 'trained'
  createdAt: string
  features: readonly FeatureName[]
  risk: LinearModel
  readiness: LinearModel
  metrics?: TrainingMetrics
}

/** A fitted model that has not been assigned a version yet */
export type ModelDraft = Omit<ModelArtifact, 'version' | 'createdAt'>

// ─── Advisory ─────────────────────────────────────────────────────────────

export interface ProfileSummary {
  monthlyIncome: number
  monthlyExpenses: number
  monthlySavings: number
  monthlySurplus: number
  totalDebt: number
  insuranceCoverage: number
  emergencyFund: number
  investments: number
  age: number
  dependents: number
  healthScore: number
  goals?: string
}

export interface AdvisoryContext {
  profile: ProfileSummary
  score: ScoreResult
}

export type AdvisorProviderId = 'gemini' | 'offline'

export interface AdvisoryExchange {
  id: string
  question: string
  context: AdvisoryContext
  /** Null when the advisor was unavailable */
  answer: string | null
  provider: AdvisorProviderId | 'unavailable'
  timestamp: string
}
