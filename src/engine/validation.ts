/**
 * Ledgerwise - Profile Validation Schemas
 * Runtime validation for form input, stored records and API bodies.
 * Uses Zod for type-safe validation.
 *
 * @module validation
 */

import { z } from 'zod'
import { ValidationError } from './errors'
import type { FinancialProfile } from './types'

// ─── Primitive Validators ─────────────────────────────────────────────────

const amount = z.number().finite().min(0, 'Must be zero or more')
const interestRate = z.number().finite().min(0, 'Rate cannot be negative').max(1, 'Rate is an annual fraction (0.18 = 18%)')

// ─── Profile ──────────────────────────────────────────────────────────────

export const incomePeriodSchema = z.enum(['monthly', 'annual'])

export const debtSchema = z.object({
  label: z.string().max(100).optional(),
  amount,
  rate: interestRate,
})

const profileShape = z.object({
  income: z.number().finite().gt(0, 'Income must be greater than zero'),
  period: incomePeriodSchema.default('monthly'),
  fixedExpenses: amount,
  variableExpenses: amount,
  savings: amount,
  debts: z.array(debtSchema).max(50).default([]),
  insuranceCoverage: amount,
  age: z.number().int().min(0).max(120),
  dependents: z.number().int().min(0).max(20),
  emergencyFund: amount.optional(),
  investments: amount.optional(),
  goals: z.string().max(2000).optional(),
})

export const financialProfileSchema = profileShape.superRefine((p, ctx) => {
  if (p.savings > p.income) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['savings'],
      message: 'Savings cannot exceed income for the same period',
    })
  }
})

/** Shape accepted from forms and API bodies (defaults not yet applied) */
export type ProfileInput = z.input<typeof financialProfileSchema>

// ─── Validation Functions ─────────────────────────────────────────────────

export interface FieldIssue {
  path: string
  message: string
}

export type ValidationResult<T> =
  | { valid: true; data: T; warnings: FieldIssue[] }
  | { valid: false; errors: FieldIssue[]; warnings: FieldIssue[] }

/** `['debts', 0, 'amount']` → `debts[0].amount` */
export function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((acc, part) =>
    typeof part === 'number' ? `${acc}[${part}]` : acc ? `${acc}.${part}` : part, '')
}

/** Validate a profile from any source */
export function validateProfile(input: unknown): ValidationResult<FinancialProfile> {
  const result = financialProfileSchema.safeParse(input)
  if (result.success) {
    return { valid: true, data: result.data, warnings: generateWarnings(result.data) }
  }
  return {
    valid: false,
    errors: result.error.issues.map(issue => ({
      path: formatPath(issue.path),
      message: issue.message,
    })),
    warnings: [],
  }
}

/** Validate and return the profile, or throw ValidationError naming the bad fields */
export function parseProfile(input: unknown): FinancialProfile {
  const result = validateProfile(input)
  if (result.valid) return result.data
  const fields = [...new Set(result.errors.map(e => e.path || 'profile'))]
  throw new ValidationError(
    `Invalid profile: ${result.errors.map(e => `${e.path || 'profile'} (${e.message})`).join(', ')}`,
    fields,
  )
}

// ─── Warning Generator ────────────────────────────────────────────────────

function generateWarnings(p: FinancialProfile): FieldIssue[] {
  const warnings: FieldIssue[] = []

  const annualIncome = p.period === 'monthly' ? p.income * 12 : p.income
  if (annualIncome > 10_000_000) {
    warnings.push({ path: 'income', message: `$${annualIncome.toLocaleString('en-US')} a year is unusually high, verify` })
  }

  if (p.fixedExpenses + p.variableExpenses + p.savings > p.income) {
    warnings.push({ path: 'variableExpenses', message: 'Expenses plus savings exceed income' })
  }

  p.debts.forEach((d, i) => {
    if (d.rate > 0.36) {
      warnings.push({ path: `debts[${i}].rate`, message: `${(d.rate * 100).toFixed(1)}% is a very high interest rate` })
    }
  })

  return warnings
}
