/**
 * Ledgerwise - Profile Editor
 *
 * Stepped form for the financial profile, with CSV import/export and a
 * sample profile. Validation runs locally first; fields the server
 * rejects are marked the same way.
 */

import { useMemo, useRef, useState, type ChangeEvent, type CSSProperties } from 'react'
import {
  DollarSign, CreditCard, Shield, CheckCircle2, ChevronLeft, ChevronRight,
  Plus, Trash2, Upload, Download, Sparkles, AlertTriangle,
} from 'lucide-react'
import { CurrencyInput, PercentInput, ValidatedInput } from '../components/ValidatedInput'
import { useNotify } from '../components/ToastSystem'
import { useLedger } from '../hooks/useLedger'
import { datedFilename, downloadText } from '../engine/download'
import { notices } from '../engine/notices'
import {
  emptyDebtRow, issuesByField, profileToForm, readProfileForm,
  type DebtRow, type NumericField, type ProfileForm,
} from '../engine/profile-form'
import { profileFromCsv, profileToCsv } from '../engine/profile-csv'
import { createEmptyProfile, createSampleProfile } from '../engine/sample-data'

const STEPS = ['Income & Spending', 'Debts', 'Protection & Goals', 'Review'] as const

const STEP_ICONS = [
  <DollarSign size={18} key="income" />,
  <CreditCard size={18} key="debts" />,
  <Shield size={18} key="protection" />,
  <CheckCircle2 size={18} color="var(--accent-emerald)" key="review" />,
]

const PROTECTION_FIELDS = new Set(['insuranceCoverage', 'age', 'dependents', 'emergencyFund', 'investments', 'goals'])

/** Step that holds the field at `path` */
function stepOf(path: string): number {
  if (path.startsWith('debts')) return 1
  if (PROTECTION_FIELDS.has(path)) return 2
  if (path === 'profile') return 3
  return 0
}

const labelStyle: CSSProperties = { fontSize: 12, fontWeight: 500, color: 'var(--text-secondary)', marginBottom: 6, display: 'block' }
const selectStyle: CSSProperties = {
  width: '100%', padding: '10px 14px', borderRadius: 10, background: 'var(--bg-surface)',
  border: '1px solid var(--border-subtle)', color: 'var(--text-primary)', fontSize: 14,
}

interface DataSetupProps {
  onSaved: () => void
}

export function DataSetup({ onSaved }: DataSetupProps) {
  const { profile, saveProfile, backend } = useLedger()
  const notify = useNotify()
  const [form, setForm] = useState<ProfileForm>(() => profileToForm(profile ?? createEmptyProfile()))
  const [errors, setErrors] = useState<Record<string, string>>({})
  const [step, setStep] = useState(0)
  const [saving, setSaving] = useState(false)
  const fileInputRef = useRef<HTMLInputElement>(null)

  const preview = useMemo(() => readProfileForm(form), [form])

  // ---- Editing ----

  const setField = (field: NumericField | 'goals') => (value: string) => {
    setForm(f => ({ ...f, [field]: value }))
    setErrors(prev => {
      const next = { ...prev }
      delete next[field]
      return next
    })
  }

  const setDebt = (index: number, patch: Partial<DebtRow>) => {
    setForm(f => ({ ...f, debts: f.debts.map((d, i) => (i === index ? { ...d, ...patch } : d)) }))
  }

  const removeDebt = (index: number) => {
    setForm(f => ({ ...f, debts: f.debts.filter((_, i) => i !== index) }))
    // Row positions shift, so debt errors no longer line up
    setErrors(prev => Object.fromEntries(Object.entries(prev).filter(([k]) => !k.startsWith('debts'))))
  }

  const showErrors = (next: Record<string, string>) => {
    setErrors(next)
    const first = Object.keys(next)[0]
    if (first !== undefined) setStep(stepOf(first))
  }

  // ---- Save ----

  const save = async () => {
    if (!preview.valid) {
      showErrors(issuesByField(preview.errors))
      notify(notices.fixFieldsFirst(preview.errors, 'save'))
      return
    }
    setSaving(true)
    try {
      const result = await saveProfile(preview.data)
      if (result.ok) {
        setErrors({})
        notify(notices.profileSaved(result.warnings))
        onSaved()
      } else {
        showErrors(Object.fromEntries(result.fields.map(f => [f, result.message])))
        notify(notices.profileNotSaved(result.message))
      }
    } finally {
      setSaving(false)
    }
  }

  // ---- CSV ----

  const handleFileSelected = async (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0]
    e.target.value = ''
    if (!file) return

    let text: string
    try {
      text = await file.text()
    } catch (err) {
      notify(notices.fileUnreadable(file.name, err))
      return
    }
    const result = profileFromCsv(text)
    if (!result.valid) {
      showErrors(issuesByField(result.errors))
      notify(notices.importRejected(file.name, result.errors))
      return
    }
    setForm(profileToForm(result.data))
    setErrors({})
    notify(notices.profileImported(file.name))
  }

  const exportCsv = () => {
    if (!preview.valid) {
      showErrors(issuesByField(preview.errors))
      notify(notices.fixFieldsFirst(preview.errors, 'export'))
      return
    }
    downloadText(datedFilename('ledgerwise-profile', 'csv'), profileToCsv(preview.data), 'text/csv')
  }

  const loadSample = () => {
    setForm(profileToForm(createSampleProfile()))
    setErrors({})
  }

  // ---- Steps ----

  const renderStep = () => {
    switch (step) {
      case 0: return (
        <div className="grid-2" style={{ gap: 16 }}>
          <div>
            <label style={labelStyle} htmlFor="profile-period">Amounts are</label>
            <select id="profile-period" style={selectStyle} value={form.period}
              onChange={e => { const period = e.target.value === 'annual' ? 'annual' : 'monthly'; setForm(f => ({ ...f, period })) }}>
              <option value="monthly">Per month</option>
              <option value="annual">Per year</option>
            </select>
          </div>
          <CurrencyInput label="Income after tax" value={form.income} onChange={setField('income')} required externalError={errors.income} />
          <CurrencyInput label="Fixed expenses" value={form.fixedExpenses} onChange={setField('fixedExpenses')} required
            helpText="Rent or mortgage, utilities, insurance premiums, loan payments" externalError={errors.fixedExpenses} />
          <CurrencyInput label="Variable expenses" value={form.variableExpenses} onChange={setField('variableExpenses')} required
            helpText="Groceries, transport, dining out, entertainment" externalError={errors.variableExpenses} />
          <CurrencyInput label="Savings" value={form.savings} onChange={setField('savings')} required
            helpText="Amount put aside each period, including retirement contributions" externalError={errors.savings} />
        </div>
      )
      case 1: return (
        <div style={{ display: 'flex', flexDirection: 'column', gap: 12 }}>
          {form.debts.length === 0 && (
            <div style={{ fontSize: 13, color: 'var(--text-muted)' }}>No debts recorded. Add loans, cards and mortgages here.</div>
          )}
          {form.debts.map((debt, i) => (
            <div key={i} className="grid-3" style={{ gap: 12, alignItems: 'start', padding: 12, borderRadius: 10, background: 'var(--bg-surface)' }}>
              <ValidatedInput label="Name" value={debt.label} onChange={label => setDebt(i, { label })} placeholder="Car loan" externalError={errors[`debts[${i}].label`]} />
              <CurrencyInput label="Balance" value={debt.amount} onChange={amount => setDebt(i, { amount })} required externalError={errors[`debts[${i}].amount`]} />
              <div style={{ display: 'flex', gap: 8, alignItems: 'flex-start' }}>
                <PercentInput label="Interest rate" value={debt.ratePercent} onChange={ratePercent => setDebt(i, { ratePercent })} externalError={errors[`debts[${i}].rate`]} />
                <button className="btn btn-ghost" onClick={() => removeDebt(i)} aria-label={`Remove debt ${i + 1}`} style={{ marginTop: 26 }}>
                  <Trash2 size={14} />
                </button>
              </div>
            </div>
          ))}
          <button onClick={() => setForm(f => ({ ...f, debts: [...f.debts, emptyDebtRow()] }))} className="btn btn-ghost" style={{ width: '100%', justifyContent: 'center', padding: 12 }}>
            <Plus size={14} /> Add Debt
          </button>
        </div>
      )
      case 2: return (
        <div className="grid-2" style={{ gap: 16 }}>
          <CurrencyInput label="Life insurance cover" value={form.insuranceCoverage} onChange={setField('insuranceCoverage')} required externalError={errors.insuranceCoverage} />
          <ValidatedInput label="Age" type="number" value={form.age} onChange={setField('age')} required min={0} max={120} externalError={errors.age} />
          <ValidatedInput label="Dependents" type="number" value={form.dependents} onChange={setField('dependents')} required min={0} max={20} externalError={errors.dependents} />
          <CurrencyInput label="Emergency fund" value={form.emergencyFund} onChange={setField('emergencyFund')}
            helpText="Cash you could reach within a week" externalError={errors.emergencyFund} />
          <CurrencyInput label="Investments" value={form.investments} onChange={setField('investments')} externalError={errors.investments} />
          <div className="form-field">
            <label className="form-label" htmlFor="profile-goals">Goals</label>
            <textarea id="profile-goals" className="form-input" rows={3} value={form.goals} maxLength={2000}
              onChange={e => setField('goals')(e.target.value)} placeholder="e.g. Buy a home in five years" />
            {errors.goals && <div className="form-error" role="alert"><AlertTriangle size={12} />{errors.goals}</div>}
          </div>
        </div>
      )
      default: return (
        <div style={{ display: 'flex', flexDirection: 'column', gap: 10 }}>
          {preview.valid ? (
            <>
              <div style={{ fontSize: 13, color: 'var(--accent-emerald)', display: 'flex', gap: 6, alignItems: 'center' }}>
                <CheckCircle2 size={14} /> Everything checks out.
              </div>
              {preview.warnings.map(w => (
                <div key={w.path} style={{ fontSize: 12, color: 'var(--accent-amber)', display: 'flex', gap: 6, alignItems: 'center' }}>
                  <AlertTriangle size={12} /> {w.message}
                </div>
              ))}
            </>
          ) : (
            preview.errors.map(issue => (
              <button key={`${issue.path}:${issue.message}`} className="btn btn-ghost" onClick={() => setStep(stepOf(issue.path || 'profile'))}
                style={{ justifyContent: 'flex-start', color: 'var(--accent-red)', fontSize: 12 }}>
                <AlertTriangle size={12} /> {issue.path || 'profile'}: {issue.message}
              </button>
            ))
          )}
          {errors.profile && <div className="form-error" role="alert"><AlertTriangle size={12} />{errors.profile}</div>}
          <div style={{ fontSize: 11, color: 'var(--text-muted)', marginTop: 8 }}>
            {backend === 'local' ? 'Saved in this browser only.' : 'Saved to your account.'}
          </div>
        </div>
      )
    }
  }

  return (
    <div className="view-enter" style={{ maxWidth: 800, margin: '0 auto' }}>
      <div style={{ marginBottom: 24, display: 'flex', justifyContent: 'space-between', alignItems: 'flex-end', gap: 16 }}>
        <div>
          <h1 className="section-title">{profile ? 'Edit My Finances' : 'Set Up Your Finances'}</h1>
          <p className="section-subtitle">Scores, forecasts and advice are recalculated whenever you save</p>
        </div>
        <div style={{ display: 'flex', gap: 8 }}>
          <button className="btn btn-ghost" onClick={() => fileInputRef.current?.click()}><Upload size={14} /> Import CSV</button>
          <button className="btn btn-ghost" onClick={exportCsv}><Download size={14} /> Export CSV</button>
          <button className="btn btn-ghost" onClick={loadSample}><Sparkles size={14} /> Sample</button>
          <input ref={fileInputRef} type="file" accept=".csv,text/csv" hidden
            onChange={e => { handleFileSelected(e).catch(err => notify(notices.fileUnreadable('the selected file', err))) }} />
        </div>
      </div>

      {/* Step indicator */}
      <div style={{ display: 'flex', gap: 4, marginBottom: 24 }}>
        {STEPS.map((s, i) => {
          const hasError = Object.keys(errors).some(k => stepOf(k) === i)
          return (
            <button key={s} style={{ flex: 1, cursor: 'pointer', background: 'none', border: 'none', padding: 0 }} onClick={() => setStep(i)} aria-current={i === step ? 'step' : undefined}>
              <div style={{ height: 4, borderRadius: 2, marginBottom: 8, background: hasError ? 'var(--accent-red)' : i <= step ? 'var(--accent-emerald)' : 'var(--bg-surface)' }} />
              <div style={{ fontSize: 11, fontWeight: i === step ? 600 : 400, color: i <= step ? 'var(--accent-emerald)' : 'var(--text-muted)', textAlign: 'center' }}>{s}</div>
            </button>
          )
        })}
      </div>

      {/* Step content */}
      <div className="card" style={{ marginBottom: 24 }}>
        <div className="card-header">
          <span className="card-title" style={{ display: 'flex', alignItems: 'center', gap: 8 }}>
            {STEP_ICONS[step]} {STEPS[step]}
          </span>
          <span style={{ fontSize: 12, color: 'var(--text-muted)' }}>Step {step + 1} of {STEPS.length}</span>
        </div>
        <div className="card-body">
          {renderStep()}
        </div>
      </div>

      {/* Navigation */}
      <div style={{ display: 'flex', justifyContent: 'space-between' }}>
        <button className="btn btn-ghost" onClick={() => setStep(Math.max(0, step - 1))} disabled={step === 0} style={{ opacity: step === 0 ? 0.3 : 1 }}>
          <ChevronLeft size={14} /> Back
        </button>
        {step < STEPS.length - 1 ? (
          <button className="btn btn-primary" onClick={() => setStep(step + 1)}>
            Continue <ChevronRight size={14} />
          </button>
        ) : (
          <button className="btn btn-primary" disabled={saving}
            onClick={() => { save().catch(e => notify(notices.profileNotSaved(e))) }}>
            <Sparkles size={14} /> {saving ? 'Saving...' : 'Save & Recalculate'}
          </button>
        )}
      </div>
    </div>
  )
}
