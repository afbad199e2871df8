import { describe, it, expect } from 'vitest'
import { buildFeatures } from './feature-builder'
import {
  calculateHealthScore, calculateRiskFactors, generateActionItems, MAX_ACTION_ITEMS, scoreToGrade,
} from './health-score'
import { scoreFeatures } from './scoring'
import { starterProfile, strongProfile, stretchedProfile } from './__fixtures__/profiles'

describe('health score', () => {
  it('scores the starter profile', () => {
    const report = calculateHealthScore(buildFeatures(starterProfile))
    expect(report.overallScore).toBe(58)
    expect(report.grade).toBe('F')
    expect(report.status).toBe('Fair')
    expect(report.color).toBe('#dc2626')
    const [income, savings, debt, emergency, coverage] = report.dimensions.map(d => d.points)
    expect(income).toBe(20)
    expect(savings).toBeCloseTo(12.5, 10)
    expect(debt).toBe(20)
    expect(emergency).toBe(0)
    expect(coverage).toBe(5)
  })

  it('gives a full score to a fully prepared household', () => {
    const report = calculateHealthScore(buildFeatures(strongProfile))
    expect(report.overallScore).toBe(100)
    expect(report.grade).toBe('A+')
    expect(report.status).toBe('Excellent')
  })

  it('flags a stretched household', () => {
    const report = calculateHealthScore(buildFeatures(stretchedProfile))
    expect(report.overallScore).toBe(36)
    expect(report.status).toBe('Needs Improvement')
  })

  it('grades on the boundaries', () => {
    expect(scoreToGrade(90)).toBe('A-')
    expect(scoreToGrade(89)).toBe('B+')
    expect(scoreToGrade(60)).toBe('D')
    expect(scoreToGrade(59)).toBe('F')
  })
})

describe('risk factors', () => {
  it('rates each factor from 0 to 10', () => {
    const factors = calculateRiskFactors(buildFeatures(starterProfile))
    expect(factors).toEqual([
      { name: 'Debt', level: 0 },
      { name: 'Emergency Fund', level: 10 },
      { name: 'Insurance', level: 10 },
      { name: 'Expenses', level: 7.2 },
      { name: 'Interest', level: 0 },
    ])
  })

  it('caps debt and interest at 10', () => {
    const factors = calculateRiskFactors(buildFeatures(stretchedProfile))
    expect(factors[0]).toEqual({ name: 'Debt', level: 10 })
    expect(factors[4]).toEqual({ name: 'Interest', level: 8 })
  })
})

describe('action items', () => {
  it('lists the gaps of the starter profile in priority order', () => {
    const features = buildFeatures(starterProfile)
    expect(generateActionItems(features, scoreFeatures(features))).toEqual([
      'Build an emergency fund that covers 3-6 months of expenses',
      'Review life cover: about $450,000 short of the recommended amount',
    ])
  })

  it('keeps only the most urgent items', () => {
    const features = buildFeatures(stretchedProfile)
    const items = generateActionItems(features, scoreFeatures(features))
    expect(items).toHaveLength(MAX_ACTION_ITEMS)
    expect(items[0]).toBe('Build an emergency fund that covers 3-6 months of expenses')
    expect(items[3]).toBe('Review life cover: about $480,000 short of the recommended amount')
  })
})
