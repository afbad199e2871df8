/**
 * Ledgerwise - Financial Health Score
 *
 * Composite 0-100 score across five dimensions with letter grades,
 * 0-10 risk factors, and a short list of prioritized action items.
 */

import type { DerivedFeatures, ScoreResult } from './types'

// ─── Types ───────────────────────────────────────────────────────────────

export type HealthGrade = 'A+' | 'A' | 'A-' | 'B+' | 'B' | 'B-' | 'C+' | 'C' | 'C-' | 'D' | 'F'

export type HealthStatus = 'Excellent' | 'Good' | 'Fair' | 'Needs Improvement'

export interface HealthDimension {
  id: 'income' | 'savings' | 'debt' | 'emergency' | 'coverage'
  name: string
  points: number
  maxPoints: number
  detail: string
}

export interface HealthReport {
  overallScore: number
  grade: HealthGrade
  status: HealthStatus
  color: string
  dimensions: HealthDimension[]
}

export interface RiskFactor {
  name: 'Debt' | 'Emergency Fund' | 'Insurance' | 'Expenses' | 'Interest'
  /** 0 (none) to 10 (severe) */
  level: number
}

// ─── Grading ─────────────────────────────────────────────────────────────

export function scoreToGrade(score: number): HealthGrade {
  if (score >= 97) return 'A+'
  if (score >= 93) return 'A'
  if (score >= 90) return 'A-'
  if (score >= 87) return 'B+'
  if (score >= 83) return 'B'
  if (score >= 80) return 'B-'
  if (score >= 77) return 'C+'
  if (score >= 73) return 'C'
  if (score >= 70) return 'C-'
  if (score >= 60) return 'D'
  return 'F'
}

export function scoreToStatus(score: number): HealthStatus {
  if (score >= 80) return 'Excellent'
  if (score >= 60) return 'Good'
  if (score >= 40) return 'Fair'
  return 'Needs Improvement'
}

export function gradeColor(grade: HealthGrade): string {
  if (grade.startsWith('A')) return '#10b981'
  if (grade.startsWith('B')) return '#3b82f6'
  if (grade.startsWith('C')) return '#f59e0b'
  if (grade.startsWith('D')) return '#ef4444'
  return '#dc2626'
}

// ─── Dimension Scorers ──────────────────────────────────────────────────

function tiered(value: number, tiers: [threshold: number, points: number][], fallback: number): number {
  for (const [threshold, points] of tiers) {
    if (value >= threshold) return points
  }
  return fallback
}

function debtPoints(dti: number): number {
  if (dti < 0.2) return 20
  if (dti < 0.4) return 15
  if (dti < 0.6) return 10
  return 5
}

export function scoreDimensions(f: DerivedFeatures): HealthDimension[] {
  return [
    {
      id: 'income', name: 'Income Stability', maxPoints: 20,
      points: f.annualIncome > 0 ? 20 : 0,
      detail: `$${Math.round(f.monthlyIncome).toLocaleString('en-US')} per month`,
    },
    {
      id: 'savings', name: 'Savings Rate', maxPoints: 25,
      points: Math.min(25, Math.max(0, f.savingsRate * 125)),
      detail: `${(f.savingsRate * 100).toFixed(1)}% of income saved`,
    },
    {
      id: 'debt', name: 'Debt Load', maxPoints: 20,
      points: debtPoints(f.debtToIncome),
      detail: `Debt is ${(f.debtToIncome * 100).toFixed(0)}% of annual income`,
    },
    {
      id: 'emergency', name: 'Emergency Fund', maxPoints: 15,
      points: tiered(f.emergencyMonths, [[6, 15], [3, 10], [1, 5]], 0),
      detail: `${f.emergencyMonths.toFixed(1)} months of expenses covered`,
    },
    {
      id: 'coverage', name: 'Insurance Coverage', maxPoints: 20,
      points: tiered(f.coverageRatio, [[1, 20], [0.5, 15], [0.25, 10]], 5),
      detail: `${(Math.min(f.coverageRatio, 9.99) * 100).toFixed(0)}% of recommended cover`,
    },
  ]
}

export function calculateHealthScore(f: DerivedFeatures): HealthReport {
  const dimensions = scoreDimensions(f)
  const total = dimensions.reduce((sum, d) => sum + d.points, 0)
  const overallScore = Math.round(Math.max(0, Math.min(100, total)))
  const grade = scoreToGrade(overallScore)
  return {
    overallScore,
    grade,
    status: scoreToStatus(overallScore),
    color: gradeColor(grade),
    dimensions,
  }
}

// ─── Risk Factors ────────────────────────────────────────────────────────

const oneDecimal = (n: number) => Math.round(n * 10) / 10

export function calculateRiskFactors(f: DerivedFeatures): RiskFactor[] {
  return [
    { name: 'Debt', level: oneDecimal(Math.min(10, f.debtToIncome * 25)) },
    { name: 'Emergency Fund', level: oneDecimal(Math.max(0, 10 - f.emergencyMonths * 1.5)) },
    { name: 'Insurance', level: oneDecimal(10 * (1 - Math.min(1, f.coverageRatio))) },
    { name: 'Expenses', level: oneDecimal(Math.min(10, f.expenseRatio * 12)) },
    { name: 'Interest', level: oneDecimal(Math.min(10, (f.weightedDebtRate / 0.3) * 10)) },
  ]
}

// ─── Action Items ────────────────────────────────────────────────────────

export const MAX_ACTION_ITEMS = 4

export function generateActionItems(f: DerivedFeatures, score: ScoreResult): string[] {
  const items: string[] = []

  if (f.emergencyMonths < 3) {
    items.push('Build an emergency fund that covers 3-6 months of expenses')
  }
  if (f.debtToIncome > 0.5) {
    items.push('Create a repayment plan to bring total debt below half of annual income')
  }
  if (f.weightedDebtRate > 0.15) {
    items.push('Pay down high-interest debt before investing further')
  }
  if (score.insuranceGap > 0 && f.dependents > 0) {
    items.push(`Review life cover: about $${Math.round(score.insuranceGap).toLocaleString('en-US')} short of the recommended amount`)
  }
  if (f.savingsRate < 0.1) {
    items.push('Raise your savings rate toward 20% of income')
  }
  if (score.investmentReadiness >= 0.6) {
    items.push('You are in a good position to start or increase regular investing')
  }

  return items.slice(0, MAX_ACTION_ITEMS)
}
