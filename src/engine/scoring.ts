/**
 * Ledgerwise - Scoring Component
 *
 * Linear models over a normalized feature vector. Every score is clamped
 * to [0,1]; the insurance gap is a currency amount.
 */

import { ScoringError } from './errors'
import { clamp } from './feature-builder'
import { FEATURE_NAMES } from './types'
import type { DerivedFeatures, LinearModel, ModelArtifact, ScoreResult } from './types'

// ─── Normalization ────────────────────────────────────────────────────────

/** Feature values at which each component saturates to 1 */
const SATURATION = {
  savingsRate: 0.5,
  debtToIncome: 1,
  weightedDebtRate: 0.3,
  expenseRatio: 1.5,
  dependents: 4,
} as const

/** Features scoring reads; anything else on DerivedFeatures is informational */
export const REQUIRED_FEATURES = [
  'savingsRate', 'debtToIncome', 'coverageRatio', 'expenseRatio',
  'weightedDebtRate', 'ageFactor', 'dependents', 'requiredCoverage',
] as const

export type ScoringInput = Pick<DerivedFeatures, typeof REQUIRED_FEATURES[number]>

export function validateFeatures(input: Partial<ScoringInput>): ScoringInput {
  const bad = REQUIRED_FEATURES.filter(name => {
    const value = input[name]
    return typeof value !== 'number' || !Number.isFinite(value)
  })

  const {
    savingsRate, debtToIncome, coverageRatio, expenseRatio,
    weightedDebtRate, ageFactor, dependents, requiredCoverage,
  } = input
  if (
    bad.length > 0 ||
    savingsRate === undefined || debtToIncome === undefined || coverageRatio === undefined ||
    expenseRatio === undefined || weightedDebtRate === undefined || ageFactor === undefined ||
    dependents === undefined || requiredCoverage === undefined
  ) {
    throw new ScoringError(`Missing or non-finite features: ${bad.join(', ')}`, bad)
  }

  return {
    savingsRate, debtToIncome, coverageRatio, expenseRatio,
    weightedDebtRate, ageFactor, dependents, requiredCoverage,
  }
}

/** Vector in FEATURE_NAMES order, each component in [0,1] */
export function normalizeFeatures(f: ScoringInput): number[] {
  return [
    clamp(f.savingsRate / SATURATION.savingsRate),
    clamp(f.debtToIncome / SATURATION.debtToIncome),
    clamp(f.weightedDebtRate / SATURATION.weightedDebtRate),
    clamp(f.coverageRatio),
    clamp(f.expenseRatio / SATURATION.expenseRatio),
    clamp(f.ageFactor),
    clamp(f.dependents / SATURATION.dependents),
  ]
}

// ─── Baseline Model ───────────────────────────────────────────────────────

/** Freeze an artifact and its weight arrays so served models cannot drift */
export function freezeArtifact(artifact: ModelArtifact): ModelArtifact {
  Object.freeze(artifact.risk.weights)
  Object.freeze(artifact.risk)
  Object.freeze(artifact.readiness.weights)
  Object.freeze(artifact.readiness)
  if (artifact.metrics) Object.freeze(artifact.metrics)
  return Object.freeze(artifact)
}

export const BASELINE_MODEL: ModelArtifact = freezeArtifact({
  version: 0,
  kind: 'baseline',
  createdAt: '1970-01-01T00:00:00.000Z',
  features: FEATURE_NAMES,
  //        savings  debt  debtRate coverage expenses age   dependents
  risk: { intercept: 0.30, weights: [-0.10, 0.30, 0.15, -0.20, 0.25, 0, 0] },
  readiness: { intercept: 0.50, weights: [0.35, -0.20, 0, 0.15, -0.15, -0.15, 0] },
})

export function predict(model: LinearModel, vector: number[]): number {
  if (model.weights.length !== vector.length) {
    throw new ScoringError(`Model expects ${model.weights.length} features, got ${vector.length}`)
  }
  const raw = vector.reduce((sum, x, i) => sum + model.weights[i] * x, model.intercept)
  if (!Number.isFinite(raw)) throw new ScoringError('Model produced a non-finite score')
  return clamp(raw)
}

// ─── Scoring ──────────────────────────────────────────────────────────────

export function scoreFeatures(features: Partial<ScoringInput>, model: ModelArtifact = BASELINE_MODEL): ScoreResult {
  const f = validateFeatures(features)
  const vector = normalizeFeatures(f)
  const gap = Math.max(0, f.requiredCoverage * (1 - f.coverageRatio))

  return {
    riskScore: predict(model.risk, vector),
    investmentReadiness: predict(model.readiness, vector),
    insuranceGap: Math.round(gap * 100) / 100,
    modelVersion: model.version,
  }
}

export type RiskBand = 'low' | 'moderate' | 'high'

export function riskBand(riskScore: number): RiskBand {
  if (riskScore < 0.3) return 'low'
  if (riskScore < 0.7) return 'moderate'
  return 'high'
}
