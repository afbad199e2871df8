import { describe, it, expect } from 'vitest'
import { analyzeProfile, expenseBreakdown } from './insights'
import { BASELINE_MODEL, freezeArtifact } from './scoring'
import { ValidationError } from './errors'
import { FEATURE_NAMES } from './types'
import { starterProfile, stretchedProfile } from './__fixtures__/profiles'

describe('analyzeProfile', () => {
  it('assembles the dashboard view of a profile', () => {
    const analysis = analyzeProfile(starterProfile)
    expect(analysis.score.riskScore).toBeCloseTo(0.38, 10)
    expect(analysis.score.modelVersion).toBe(0)
    expect(analysis.riskBand).toBe('moderate')
    expect(analysis.health.overallScore).toBe(58)
    expect(analysis.actionItems).toHaveLength(2)
    expect(analysis.forecast).toHaveLength(3)
    expect(analysis.suggestions).toEqual([
      'How much life insurance does my family need?',
      'How do I build an emergency fund quickly?',
    ])
  })

  it('scores with the model it is given', () => {
    const model = freezeArtifact({
      ...BASELINE_MODEL,
      version: 4,
      kind: 'trained',
      features: FEATURE_NAMES,
      risk: { intercept: 0.9, weights: [0, 0, 0, 0, 0, 0, 0] },
    })
    const analysis = analyzeProfile(starterProfile, model)
    expect(analysis.score.modelVersion).toBe(4)
    expect(analysis.score.riskScore).toBeCloseTo(0.9, 10)
    expect(analysis.riskBand).toBe('high')
  })

  it('rejects an invalid profile', () => {
    expect(() => analyzeProfile({ ...starterProfile, income: 0 })).toThrow(ValidationError)
  })
})

describe('expenseBreakdown', () => {
  it('splits monthly income into spending, savings and the remainder', () => {
    expect(expenseBreakdown(stretchedProfile)).toEqual([
      { name: 'Fixed expenses', amount: 2500 },
      { name: 'Variable expenses', amount: 1000 },
      { name: 'Savings', amount: 200 },
      { name: 'Unallocated', amount: 300 },
    ])
  })

  it('converts annual figures to monthly', () => {
    const annual = { ...starterProfile, period: 'annual' as const, income: 60000, fixedExpenses: 24000, variableExpenses: 12000, savings: 6000 }
    expect(expenseBreakdown(annual).map(s => s.amount)).toEqual([2000, 1000, 500, 1500])
  })

  it('drops empty and overspent slices', () => {
    const overspent = { ...starterProfile, fixedExpenses: 4000, variableExpenses: 1500, savings: 0 }
    expect(expenseBreakdown(overspent)).toEqual([
      { name: 'Fixed expenses', amount: 4000 },
      { name: 'Variable expenses', amount: 1500 },
    ])
  })
})
