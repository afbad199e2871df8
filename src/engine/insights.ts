/**
 * Ledgerwise - Profile Analysis
 * One pass from profile to everything the dashboard renders.
 */

import { suggestQuestions } from './ai-context'
import { buildFeatures } from './feature-builder'
import { generateForecast } from './forecast'
import type { HorizonForecast } from './forecast'
import { calculateHealthScore, calculateRiskFactors, generateActionItems } from './health-score'
import type { HealthReport, RiskFactor } from './health-score'
import { BASELINE_MODEL, riskBand, scoreFeatures } from './scoring'
import type { RiskBand } from './scoring'
import type { DerivedFeatures, FinancialProfile, ModelArtifact, ScoreResult } from './types'

export interface ProfileAnalysis {
  features: DerivedFeatures
  score: ScoreResult
  riskBand: RiskBand
  health: HealthReport
  riskFactors: RiskFactor[]
  actionItems: string[]
  forecast: HorizonForecast[]
  suggestions: string[]
  expenses: ExpenseSlice[]
}

export interface ExpenseSlice {
  name: 'Fixed expenses' | 'Variable expenses' | 'Savings' | 'Unallocated'
  /** Per month */
  amount: number
}

/** Where each month's income goes. Empty slices are left out. */
export function expenseBreakdown(profile: FinancialProfile): ExpenseSlice[] {
  const perMonth = profile.period === 'annual' ? 1 / 12 : 1
  const unallocated = profile.income - profile.fixedExpenses - profile.variableExpenses - profile.savings
  const slices: ExpenseSlice[] = [
    { name: 'Fixed expenses', amount: profile.fixedExpenses * perMonth },
    { name: 'Variable expenses', amount: profile.variableExpenses * perMonth },
    { name: 'Savings', amount: profile.savings * perMonth },
    { name: 'Unallocated', amount: unallocated * perMonth },
  ]
  return slices
    .map(s => ({ ...s, amount: Math.round(s.amount * 100) / 100 }))
    .filter(s => s.amount > 0)
}

/** Throws ValidationError for a bad profile and ScoringError for a bad model */
export function analyzeProfile(profile: FinancialProfile, model: ModelArtifact = BASELINE_MODEL): ProfileAnalysis {
  const features = buildFeatures(profile)
  const score = scoreFeatures(features, model)
  return {
    features,
    score,
    riskBand: riskBand(score.riskScore),
    health: calculateHealthScore(features),
    riskFactors: calculateRiskFactors(features),
    actionItems: generateActionItems(features, score),
    forecast: generateForecast(profile, features, score),
    suggestions: suggestQuestions(profile, features),
    expenses: expenseBreakdown(profile),
  }
}
