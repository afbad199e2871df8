/**
 * Ledgerwise - Profile CSV
 *
 * Round-trips a profile through a two-column `field,value` sheet. Debts are
 * one row each: `debt,<label>,<amount>,<rate>`.
 */

import { validateProfile } from './validation'
import type { ValidationResult } from './validation'
import type { FinancialProfile } from './types'

const SCALAR_FIELDS = [
  'income', 'period', 'fixedExpenses', 'variableExpenses', 'savings',
  'insuranceCoverage', 'age', 'dependents', 'emergencyFund', 'investments', 'goals',
] as const

type ScalarField = typeof SCALAR_FIELDS[number]

const TEXT_FIELDS: ReadonlySet<ScalarField> = new Set<ScalarField>(['period', 'goals'])

function isScalarField(name: string): name is ScalarField {
  return (SCALAR_FIELDS as readonly string[]).includes(name)
}

// ─── Parsing ──────────────────────────────────────────────────────────────

export function parseCSVLine(line: string): string[] {
  const result: string[] = []
  let current = ''
  let inQuotes = false
  for (let i = 0; i < line.length; i++) {
    const ch = line[i]
    if (ch === '"') {
      if (inQuotes && i + 1 < line.length && line[i + 1] === '"') {
        current += '"'
        i++
      } else {
        inQuotes = !inQuotes
      }
    } else if (ch === ',' && !inQuotes) {
      result.push(current.trim())
      current = ''
    } else {
      current += ch
    }
  }
  result.push(current.trim())
  return result
}

function escapeCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

/** Numbers may carry `$` and thousands separators; anything unparseable stays a string for the validator to reject */
function toNumber(raw: string): number | string {
  const cleaned = raw.replace(/[$,\s]/g, '')
  if (cleaned === '') return raw
  const n = Number(cleaned)
  return Number.isNaN(n) ? raw : n
}

// ─── Export / Import ──────────────────────────────────────────────────────

export function profileToCsv(profile: FinancialProfile): string {
  const rows = ['field,value']
  for (const field of SCALAR_FIELDS) {
    const value = profile[field]
    if (value === undefined) continue
    rows.push(`${field},${escapeCell(String(value).replace(/\r?\n/g, ' '))}`)
  }
  for (const debt of profile.debts) {
    rows.push(['debt', escapeCell(debt.label ?? ''), String(debt.amount), String(debt.rate)].join(','))
  }
  return rows.join('\n') + '\n'
}

export function profileFromCsv(text: string): ValidationResult<FinancialProfile> {
  const draft: Record<string, unknown> = {}
  const debts: { label?: string; amount: number | string; rate: number | string }[] = []

  const lines = text.split(/\r?\n/).filter(l => l.trim().length > 0)
  for (const line of lines) {
    const [field = '', value = '', ...rest] = parseCSVLine(line)
    if (field === 'field') continue

    if (field === 'debt') {
      const [amount = '', rate = ''] = rest
      debts.push({ ...(value ? { label: value } : {}), amount: toNumber(amount), rate: toNumber(rate) })
    } else if (isScalarField(field)) {
      draft[field] = TEXT_FIELDS.has(field) ? value : toNumber(value)
    }
  }

  draft.debts = debts
  return validateProfile(draft)
}
