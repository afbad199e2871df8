import { describe, it, expect } from 'vitest'
import { TrainingError } from './errors'
import { solveLinearSystem, trainModel } from './model-training'
import type { TrainingSample } from './model-training'
import { normalizeFeatures } from './scoring'
import type { ScoringInput } from './scoring'

/** Deterministic pseudo-random numbers in [0,1) */
function lcg(seed: number): () => number {
  let state = seed
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296
    return state / 4294967296
  }
}

const RISK = { intercept: 0.25, weights: [-0.1, 0.3, 0.1, -0.2, 0.2, 0.05, 0.05] }
const READINESS = { intercept: 0.4, weights: [0.3, -0.2, -0.05, 0.1, -0.1, -0.1, 0.02] }

function dot(model: { intercept: number; weights: number[] }, v: number[]): number {
  return v.reduce((sum, x, i) => sum + model.weights[i] * x, model.intercept)
}

/** Features chosen inside the unclamped range of every normalized component */
function syntheticBatch(n: number, seed = 42): TrainingSample[] {
  const rand = lcg(seed)
  return Array.from({ length: n }, () => {
    const features: ScoringInput = {
      savingsRate: rand() * 0.5,
      debtToIncome: rand(),
      weightedDebtRate: rand() * 0.3,
      coverageRatio: rand(),
      expenseRatio: rand() * 1.5,
      ageFactor: rand(),
      dependents: rand() * 4,
      requiredCoverage: 100000,
    }
    const v = normalizeFeatures(features)
    return { features, outcome: { riskScore: dot(RISK, v), investmentReadiness: dot(READINESS, v) } }
  })
}

describe('model training: batch validation', () => {
  it('rejects an empty batch', () => {
    expect(() => trainModel([])).toThrow(TrainingError)
  })

  it('names the sample with a NaN feature', () => {
    const batch = syntheticBatch(5)
    batch[1] = { ...batch[1], features: { ...batch[1].features, debtToIncome: Number.NaN } }
    try {
      trainModel(batch)
      throw new Error('expected TrainingError')
    } catch (e) {
      expect(e).toBeInstanceOf(TrainingError)
      if (e instanceof TrainingError) expect(e.sampleIndex).toBe(1)
    }
  })

  it('rejects a missing outcome', () => {
    const batch = syntheticBatch(5)
    batch[3] = { ...batch[3], outcome: { riskScore: 0.2 } }
    expect(() => trainModel(batch)).toThrow(/Sample 3/)
  })

  it('rejects a negative penalty', () => {
    expect(() => trainModel(syntheticBatch(5), { lambda: -1 })).toThrow(TrainingError)
  })
})

describe('model training: fitting', () => {
  it('recovers the generating weights from exact data', () => {
    const draft = trainModel(syntheticBatch(30), { lambda: 0 })
    expect(draft.kind).toBe('trained')
    expect(draft.risk.intercept).toBeCloseTo(RISK.intercept, 6)
    draft.risk.weights.forEach((w, i) => expect(w).toBeCloseTo(RISK.weights[i], 6))
    draft.readiness.weights.forEach((w, i) => expect(w).toBeCloseTo(READINESS.weights[i], 6))
    expect(draft.metrics?.samples).toBe(30)
    expect(draft.metrics?.riskMse).toBeLessThan(1e-12)
  })

  it('fits a single sample when regularized', () => {
    const draft = trainModel(syntheticBatch(1))
    expect(draft.risk.weights).toHaveLength(7)
    expect(draft.risk.weights.every(Number.isFinite)).toBe(true)
  })

  it('does not mutate the input batch', () => {
    const batch = syntheticBatch(10)
    const copy = structuredClone(batch)
    trainModel(batch)
    expect(batch).toEqual(copy)
  })
})

describe('model training: linear solver', () => {
  it('solves a 2x2 system', () => {
    const [x, y] = solveLinearSystem([[2, 1], [1, 3]], [3, 5])
    expect(x).toBeCloseTo(0.8, 12)
    expect(y).toBeCloseTo(1.4, 12)
  })

  it('rejects a singular system', () => {
    expect(() => solveLinearSystem([[1, 2], [2, 4]], [1, 2])).toThrow(TrainingError)
  })
})
