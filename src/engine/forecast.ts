/**
 * Ledgerwise - Savings Forecast
 * Projects savings over 1, 3 and 10 years from the current profile and scores.
 */

import type { DerivedFeatures, FinancialProfile, ScoreResult } from './types'

export const FORECAST_HORIZONS = [1, 3, 10] as const
export type ForecastHorizon = typeof FORECAST_HORIZONS[number]

export type HorizonStatus = 'Excellent' | 'Good' | 'Moderate' | 'High Risk'

export interface HorizonForecast {
  years: ForecastHorizon
  /** Sum of contributions with no growth */
  contributed: number
  /** Starting balance plus contributions, compounded monthly */
  projectedBalance: number
  investmentReturns: number
  expectedReturn: number
  /** Risk on a 0-10 scale */
  riskLevel: number
  status: HorizonStatus
}

/** Expected annual return rises with readiness (more equity exposure) */
export function expectedAnnualReturn(investmentReadiness: number): number {
  return 0.05 + 0.04 * investmentReadiness
}

/** Future value of `start` plus `monthly` deposits at the end of each month */
export function projectBalance(start: number, monthly: number, annualRate: number, months: number): number {
  const i = annualRate / 12
  if (i === 0) return start + monthly * months
  const growth = (1 + i) ** months
  return start * growth + monthly * ((growth - 1) / i)
}

export function horizonStatus(years: ForecastHorizon, riskScore: number): HorizonStatus {
  if (years >= 10) {
    if (riskScore < 0.2) return 'Excellent'
    if (riskScore < 0.5) return 'Good'
    return 'Moderate'
  }
  if (riskScore < 0.3) return 'Good'
  if (riskScore < 0.7) return 'Moderate'
  return 'High Risk'
}

const cents = (n: number) => Math.round(n * 100) / 100

export function generateForecast(
  profile: FinancialProfile,
  features: DerivedFeatures,
  score: ScoreResult,
): HorizonForecast[] {
  const monthlySavings = features.savingsRate * features.monthlyIncome
  const start = (profile.investments ?? 0) + (profile.emergencyFund ?? 0)
  const rate = expectedAnnualReturn(score.investmentReadiness)

  return FORECAST_HORIZONS.map(years => {
    const months = years * 12
    const contributed = monthlySavings * months
    const projectedBalance = projectBalance(start, monthlySavings, rate, months)
    return {
      years,
      contributed: cents(contributed),
      projectedBalance: cents(projectedBalance),
      investmentReturns: cents(projectedBalance - contributed - start),
      expectedReturn: rate,
      riskLevel: Math.round(score.riskScore * 100) / 10,
      status: horizonStatus(years, score.riskScore),
    }
  })
}
