/**
 * Ledgerwise - Forecast
 * Savings projections at one, three and ten years.
 */

import { useMemo } from 'react'
import { TrendingUp, CalendarClock, AlertTriangle } from 'lucide-react'
import {
  ResponsiveContainer, AreaChart, Area, XAxis, YAxis, Tooltip, CartesianGrid, Legend,
} from 'recharts'
import { useLedger } from '../hooks/useLedger'
import { money, pct } from '../engine/ai-context'
import { projectBalance, type HorizonStatus } from '../engine/forecast'

const STATUS_COLORS: Record<HorizonStatus, string> = {
  Excellent: 'var(--accent-emerald)',
  Good: 'var(--accent-blue)',
  Moderate: 'var(--accent-gold)',
  'High Risk': 'var(--accent-red)',
}

const CURVE_YEARS = 10

export function Forecast() {
  const { analysis, profile, model } = useLedger()

  const curve = useMemo(() => {
    if (!analysis || !profile) return []
    const start = (profile.investments ?? 0) + (profile.emergencyFund ?? 0)
    const monthly = analysis.features.savingsRate * analysis.features.monthlyIncome
    const rate = analysis.forecast[0]?.expectedReturn ?? 0
    return Array.from({ length: CURVE_YEARS + 1 }, (_, year) => ({
      year: `Y${year}`,
      contributed: Math.round(start + monthly * 12 * year),
      balance: Math.round(projectBalance(start, monthly, rate, year * 12)),
    }))
  }, [analysis, profile])

  if (!analysis) return null

  const expectedReturn = analysis.forecast[0]?.expectedReturn ?? 0
  const monthlySavings = analysis.features.savingsRate * analysis.features.monthlyIncome

  return (
    <div className="view-enter">
      <div style={{ marginBottom: 20 }}>
        <div style={{ display: 'flex', alignItems: 'center', gap: 10 }}>
          <h1 className="section-title">Forecast</h1>
          <span title={`Created ${new Date(model.createdAt).toLocaleDateString('en-US')}`} style={{
            fontFamily: 'var(--font-mono)', fontSize: 10, padding: '2px 8px', borderRadius: 6,
            background: 'var(--accent-emerald-dim)', color: 'var(--accent-emerald)', textTransform: 'uppercase', letterSpacing: '0.08em',
          }}>
            {model.kind} model v{analysis.score.modelVersion}
          </span>
        </div>
        <p className="section-subtitle">
          Saving {money(monthlySavings)} a month at an expected {pct(expectedReturn)} a year
        </p>
      </div>

      {monthlySavings <= 0 && (
        <div className="urgency-bar warning">
          <AlertTriangle size={14} />
          <span>You are not saving anything each month, so balances only grow from what you already hold.</span>
        </div>
      )}

      <div className="grid-3" style={{ marginBottom: 20 }}>
        {analysis.forecast.map(h => (
          <div key={h.years} className="kpi-card" style={{ borderTopColor: STATUS_COLORS[h.status] }}>
            <div className="kpi-label"><CalendarClock size={12} /> {h.years} year{h.years > 1 ? 's' : ''}</div>
            <div className="kpi-value">{money(h.projectedBalance)}</div>
            <div className="kpi-sub">
              <span style={{ color: STATUS_COLORS[h.status], fontWeight: 500 }}>{h.status}</span> · risk {h.riskLevel.toFixed(1)}/10
            </div>
            <div style={{ marginTop: 10, display: 'flex', flexDirection: 'column', gap: 4, fontSize: 11, color: 'var(--text-muted)' }}>
              <div style={{ display: 'flex', justifyContent: 'space-between' }}>
                <span>Contributed</span><span style={{ fontFamily: 'var(--font-mono)' }}>{money(h.contributed)}</span>
              </div>
              <div style={{ display: 'flex', justifyContent: 'space-between' }}>
                <span>Investment returns</span><span style={{ fontFamily: 'var(--font-mono)', color: 'var(--accent-emerald)' }}>{money(h.investmentReturns)}</span>
              </div>
            </div>
          </div>
        ))}
      </div>

      <div className="card">
        <div className="card-header"><span className="card-title"><TrendingUp size={14} /> Growth Over {CURVE_YEARS} Years</span></div>
        <div className="card-body">
          <ResponsiveContainer width="100%" height={300}>
            <AreaChart data={curve} margin={{ left: 16, right: 16, top: 8 }}>
              <CartesianGrid stroke="var(--border-subtle)" strokeDasharray="3 3" />
              <XAxis dataKey="year" tick={{ fill: 'var(--text-muted)', fontSize: 11 }} />
              <YAxis tickFormatter={v => money(Number(v))} width={80} tick={{ fill: 'var(--text-muted)', fontSize: 10 }} />
              <Tooltip formatter={value => money(Number(value))} />
              <Legend />
              <Area type="monotone" name="Projected balance" dataKey="balance" stroke="#10b981" fill="#10b981" fillOpacity={0.15} strokeWidth={2} />
              <Area type="monotone" name="Saved without growth" dataKey="contributed" stroke="#f59e0b" fill="#f59e0b" fillOpacity={0.08} strokeWidth={2} />
            </AreaChart>
          </ResponsiveContainer>
          <div style={{ fontSize: 11, color: 'var(--text-muted)', marginTop: 8 }}>
            Projections assume monthly compounding and a constant savings rate. They are estimates, not guarantees.
          </div>
        </div>
      </div>
    </div>
  )
}
