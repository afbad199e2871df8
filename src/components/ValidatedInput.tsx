/**
 * Ledgerwise - Validated Input Components
 * Form inputs with inline validation, amount formatting and server-side field errors.
 */

import { useState, useCallback, useId, type ChangeEvent } from 'react'
import { AlertCircle, Check, HelpCircle } from 'lucide-react'

// ─── Types ──────────────────────────────────────────────────────────

type ValidationRule = {
  test: (value: string) => boolean
  message: string
}

interface ValidatedInputProps {
  label: string
  value: string
  onChange: (value: string) => void
  type?: 'text' | 'number' | 'email' | 'password' | 'currency' | 'percentage'
  placeholder?: string
  required?: boolean
  disabled?: boolean
  helpText?: string
  validationRules?: ValidationRule[]
  min?: number
  max?: number
  prefix?: string
  suffix?: string
  autoFocus?: boolean
  onBlur?: () => void
  /** Error reported for this field after a save attempt */
  externalError?: string
}

// ─── Format Helpers ─────────────────────────────────────────────────

function formatCurrency(val: string): string {
  const num = val.replace(/[^0-9.]/g, '')
  const parts = num.split('.')
  if (parts.length > 2) return formatCurrency(parts[0] + '.' + parts.slice(1).join(''))
  if (parts[0]) {
    parts[0] = parseInt(parts[0], 10).toLocaleString('en-US')
  }
  if (parts[1] !== undefined) {
    parts[1] = parts[1].slice(0, 2)
    return parts.join('.')
  }
  return parts[0] || ''
}

function parseCurrency(val: string): string {
  return val.replace(/[^0-9.]/g, '')
}

function formatPercentage(val: string): string {
  return val.replace(/[^0-9.]/g, '').slice(0, 6)
}

// ─── Built-in Validations ───────────────────────────────────────────

function getBuiltinRules(type: NonNullable<ValidatedInputProps['type']>, required?: boolean, min?: number, max?: number): ValidationRule[] {
  const rules: ValidationRule[] = []

  if (required) {
    rules.push({ test: v => v.trim().length > 0, message: 'This field is required' })
  }

  switch (type) {
    case 'email':
      rules.push({ test: v => !v || /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(v), message: 'Enter a valid email address' })
      break
    case 'currency':
      if (min !== undefined) rules.push({ test: v => !v || parseFloat(parseCurrency(v)) >= min, message: `Minimum: $${min.toLocaleString()}` })
      if (max !== undefined) rules.push({ test: v => !v || parseFloat(parseCurrency(v)) <= max, message: `Maximum: $${max.toLocaleString()}` })
      break
    case 'percentage':
      rules.push({ test: v => !v || (parseFloat(v) >= 0 && parseFloat(v) <= 100), message: 'Enter a value between 0 and 100' })
      break
  }

  return rules
}

// ─── Component ──────────────────────────────────────────────────────

export function ValidatedInput({
  label, value, onChange, type = 'text', placeholder, required, disabled,
  helpText, validationRules = [], min, max, prefix, suffix, autoFocus, onBlur, externalError,
}: ValidatedInputProps) {
  const [touched, setTouched] = useState(false)
  const [showHelp, setShowHelp] = useState(false)
  const uid = useId()
  const inputId = `input-${uid}`
  const errorId = `error-${uid}`
  const helpId = `help-${uid}`

  const allRules = [...getBuiltinRules(type, required, min, max), ...validationRules]

  const localErrors = touched ? allRules.filter(r => !r.test(value)).map(r => r.message) : []
  const errors = externalError ? [externalError, ...localErrors] : localErrors
  const isValid = touched && value.length > 0 && errors.length === 0
  const isError = errors.length > 0

  const handleChange = useCallback((e: ChangeEvent<HTMLInputElement>) => {
    let val = e.target.value
    switch (type) {
      case 'currency': val = formatCurrency(val); break
      case 'percentage': val = formatPercentage(val); break
    }
    onChange(val)
  }, [type, onChange])

  const handleBlur = useCallback(() => {
    setTouched(true)
    onBlur?.()
  }, [onBlur])

  const inputType = type === 'currency' || type === 'percentage' || type === 'number' ? 'text' : type

  const inputMode = type === 'currency' || type === 'number' || type === 'percentage' ? 'decimal' as const : undefined

  return (
    <div className="form-field">
      <label className="form-label" htmlFor={inputId}>
        {label}
        {required && <span className="required" aria-hidden="true">*</span>}
        {helpText && (
          <button
            type="button"
            onClick={() => setShowHelp(!showHelp)}
            style={{
              background: 'none', border: 'none', cursor: 'pointer',
              padding: 2, display: 'flex', color: 'var(--text-muted)',
            }}
            aria-label={`Help for ${label}`}
            aria-expanded={showHelp}
            aria-controls={helpId}
          >
            <HelpCircle size={14} />
          </button>
        )}
      </label>

      {showHelp && helpText && (
        <div id={helpId} className="form-helper" role="note">{helpText}</div>
      )}

      <div style={{ position: 'relative', display: 'flex', alignItems: 'center' }}>
        {prefix && (
          <span style={{
            position: 'absolute', left: 14, color: 'var(--text-muted)',
            fontSize: 14, pointerEvents: 'none', zIndex: 1,
          }}>{prefix}</span>
        )}

        <input
          id={inputId}
          type={inputType}
          inputMode={inputMode}
          value={value}
          onChange={handleChange}
          onBlur={handleBlur}
          placeholder={placeholder}
          disabled={disabled}
          autoFocus={autoFocus}
          required={required}
          aria-required={required}
          aria-invalid={isError}
          aria-describedby={isError ? errorId : helpText ? helpId : undefined}
          className={`form-input ${isError ? 'error' : ''} ${isValid ? 'valid' : ''}`}
          style={{
            flex: 1,
            paddingLeft: prefix ? 32 : 14,
            paddingRight: suffix || isValid || isError ? 36 : 14,
          }}
        />

        {/* Status icon */}
        {(isValid || isError) && (
          <span style={{
            position: 'absolute', right: 12,
            display: 'flex', pointerEvents: 'none',
          }}>
            {isValid && <Check size={16} color="var(--accent-emerald)" />}
            {isError && <AlertCircle size={16} color="var(--accent-red)" />}
          </span>
        )}

        {suffix && !isValid && !isError && (
          <span style={{
            position: 'absolute', right: 14, color: 'var(--text-muted)',
            fontSize: 13, pointerEvents: 'none',
          }}>{suffix}</span>
        )}
      </div>

      {isError && (
        <div id={errorId} className="form-error" role="alert">
          <AlertCircle size={12} />
          {errors[0]}
        </div>
      )}
    </div>
  )
}

// ─── Currency Shorthand ─────────────────────────────────────────────

export function CurrencyInput(props: Omit<ValidatedInputProps, 'type' | 'prefix'>) {
  return <ValidatedInput {...props} type="currency" prefix="$" />
}

export function PercentInput(props: Omit<ValidatedInputProps, 'type' | 'suffix'>) {
  return <ValidatedInput {...props} type="percentage" suffix="%" />
}
