/**
 * Ledgerwise - Model Training
 *
 * Fits the risk and readiness models from labelled history with ridge
 * least squares (MSE loss). Training is an explicit operation; scoring
 * never trains.
 */

import { ScoringError, TrainingError } from './errors'
import { normalizeFeatures, validateFeatures } from './scoring'
import type { ScoringInput } from './scoring'
import { FEATURE_NAMES } from './types'
import type { LinearModel, ModelDraft } from './types'

// ─── Types ────────────────────────────────────────────────────────────────

export interface TrainingOutcome {
  riskScore: number
  investmentReadiness: number
}

export interface TrainingSample {
  features: Partial<ScoringInput>
  outcome: Partial<TrainingOutcome>
}

export interface TrainingOptions {
  /** L2 penalty on the weights (not the intercept) */
  lambda?: number
}

export const DEFAULT_LAMBDA = 1e-3

// ─── Batch Validation ─────────────────────────────────────────────────────

interface PreparedBatch {
  rows: number[][]
  risk: number[]
  readiness: number[]
}

function prepareBatch(batch: TrainingSample[]): PreparedBatch {
  if (batch.length === 0) throw new TrainingError('Training batch is empty')

  const prepared: PreparedBatch = { rows: [], risk: [], readiness: [] }
  batch.forEach((sample, i) => {
    let features: ScoringInput
    try {
      features = validateFeatures(sample.features)
    } catch (e) {
      if (e instanceof ScoringError) {
        throw new TrainingError(`Sample ${i}: ${e.message}`, i)
      }
      throw e
    }

    const { riskScore, investmentReadiness } = sample.outcome
    if (riskScore === undefined || !Number.isFinite(riskScore) ||
        investmentReadiness === undefined || !Number.isFinite(investmentReadiness)) {
      throw new TrainingError(`Sample ${i}: outcome is missing or not a finite number`, i)
    }

    prepared.rows.push(normalizeFeatures(features))
    prepared.risk.push(riskScore)
    prepared.readiness.push(investmentReadiness)
  })
  return prepared
}

// ─── Linear Algebra ───────────────────────────────────────────────────────

/** Solve A·x = b by Gaussian elimination with partial pivoting */
export function solveLinearSystem(a: number[][], b: number[]): number[] {
  const n = b.length
  const m = a.map((row, i) => [...row, b[i]])

  for (let col = 0; col < n; col++) {
    let pivot = col
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivot][col])) pivot = r
    }
    if (Math.abs(m[pivot][col]) < 1e-12) {
      throw new TrainingError('Training data is degenerate (singular system)')
    }
    [m[col], m[pivot]] = [m[pivot], m[col]]

    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / m[col][col]
      for (let c = col; c <= n; c++) m[r][c] -= factor * m[col][c]
    }
  }

  const x = new Array<number>(n).fill(0)
  for (let r = n - 1; r >= 0; r--) {
    let sum = m[r][n]
    for (let c = r + 1; c < n; c++) sum -= m[r][c] * x[c]
    x[r] = sum / m[r][r]
  }
  return x
}

function fitRidge(rows: number[][], targets: number[], lambda: number): LinearModel {
  // Design matrix gets a leading 1 for the intercept
  const design = rows.map(r => [1, ...r])
  const k = design[0].length

  const xtx = Array.from({ length: k }, () => new Array<number>(k).fill(0))
  const xty = new Array<number>(k).fill(0)
  design.forEach((row, n) => {
    for (let i = 0; i < k; i++) {
      xty[i] += row[i] * targets[n]
      for (let j = 0; j < k; j++) xtx[i][j] += row[i] * row[j]
    }
  })
  for (let i = 1; i < k; i++) xtx[i][i] += lambda

  const [intercept, ...weights] = solveLinearSystem(xtx, xty)
  return { intercept, weights }
}

export function meanSquaredError(model: LinearModel, rows: number[][], targets: number[]): number {
  const total = rows.reduce((sum, row, n) => {
    const prediction = row.reduce((acc, x, i) => acc + model.weights[i] * x, model.intercept)
    return sum + (prediction - targets[n]) ** 2
  }, 0)
  return total / rows.length
}

// ─── Training ─────────────────────────────────────────────────────────────

export function trainModel(batch: TrainingSample[], options: TrainingOptions = {}): ModelDraft {
  const lambda = options.lambda ?? DEFAULT_LAMBDA
  if (!Number.isFinite(lambda) || lambda < 0) {
    throw new TrainingError('lambda must be a non-negative finite number')
  }

  const { rows, risk, readiness } = prepareBatch(batch)
  const riskModel = fitRidge(rows, risk, lambda)
  const readinessModel = fitRidge(rows, readiness, lambda)

  return {
    kind: 'trained',
    features: FEATURE_NAMES,
    risk: riskModel,
    readiness: readinessModel,
    metrics: {
      samples: rows.length,
      riskMse: meanSquaredError(riskModel, rows, risk),
      readinessMse: meanSquaredError(readinessModel, rows, readiness),
    },
  }
}
