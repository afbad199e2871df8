import type { ViewKey } from '../App'
import { useLedger } from '../hooks/useLedger'
import { money, pct } from '../engine/ai-context'
import type { RiskBand } from '../engine/scoring'
import {
  Activity, AlertTriangle, CheckCircle2, ChevronRight, Gauge,
  PiggyBank, Shield, TrendingUp, Bot, Wallet,
} from 'lucide-react'
import {
  ResponsiveContainer, Tooltip, BarChart, Bar, XAxis, YAxis, Cell, PieChart, Pie, Legend,
} from 'recharts'

interface DashboardProps { onNavigate: (view: ViewKey) => void }

const BAND_COLORS: Record<RiskBand, string> = {
  low: 'var(--accent-emerald)',
  moderate: 'var(--accent-gold)',
  high: 'var(--accent-red)',
}

const SLICE_COLORS = ['#3b82f6', '#a78bfa', '#10b981', '#737b8c']

function barColor(points: number, maxPoints: number): string {
  const share = points / maxPoints
  if (share >= 0.75) return '#10b981'
  if (share >= 0.5) return '#f59e0b'
  return '#ef4444'
}

function riskColor(level: number): string {
  if (level >= 7) return '#ef4444'
  if (level >= 4) return '#f59e0b'
  return '#10b981'
}

function ScoreRing({ score, color }: { score: number; color: string }) {
  const radius = 26
  const circumference = 2 * Math.PI * radius
  return (
    <svg width={64} height={64} viewBox="0 0 64 64" aria-hidden="true">
      <circle cx={32} cy={32} r={radius} fill="none" stroke="var(--bg-hover)" strokeWidth={6} />
      <circle
        cx={32} cy={32} r={radius} fill="none" stroke={color} strokeWidth={6} strokeLinecap="round"
        strokeDasharray={circumference} strokeDashoffset={circumference * (1 - score / 100)}
        transform="rotate(-90 32 32)"
      />
    </svg>
  )
}

export function Dashboard({ onNavigate }: DashboardProps) {
  const { analysis, analysisError, model, backend } = useLedger()

  if (!analysis) {
    return (
      <div className="view-enter">
        <div className="card" style={{ padding: 24, display: 'flex', gap: 12, alignItems: 'flex-start' }}>
          <AlertTriangle size={20} color="var(--accent-red)" />
          <div>
            <div style={{ fontSize: 14, fontWeight: 500, color: 'var(--text-primary)', marginBottom: 4 }}>Your profile could not be scored</div>
            <div style={{ fontSize: 12, color: 'var(--text-muted)', marginBottom: 12 }}>{analysisError ?? 'No analysis available.'}</div>
            <button className="btn btn-primary" onClick={() => onNavigate('profile')}>Review My Finances</button>
          </div>
        </div>
      </div>
    )
  }

  const { health, score, features, riskFactors, actionItems, expenses } = analysis
  const dimensionData = health.dimensions.map(d => ({ name: d.name, points: Math.round(d.points * 10) / 10, maxPoints: d.maxPoints }))
  const riskData = riskFactors.map(r => ({ factor: r.name, level: r.level }))

  return (
    <div className="view-enter">
      {/* Header */}
      <div style={{ marginBottom: 20 }}>
        <h1 className="section-title" style={{ fontSize: 26 }}>Your Financial Picture</h1>
        <p className="section-subtitle">
          Health: {health.grade} · {health.status} · Scored with {model.kind} model v{score.modelVersion}
          {backend === 'local' && <span style={{ color: 'var(--accent-amber)', marginLeft: 8 }}>· Local only</span>}
        </p>
      </div>

      {/* Urgency bar */}
      {actionItems.length > 0 && (
        <div className="urgency-bar warning">
          <AlertTriangle size={14} />
          <span style={{ fontWeight: 600 }}>{actionItems.length} action item{actionItems.length > 1 ? 's' : ''}</span>
          <span>{actionItems[0]}</span>
        </div>
      )}

      {/* KPI Row */}
      <div className="grid-4" style={{ marginBottom: 20 }}>
        <div className="kpi-card" style={{ borderTopColor: health.color, display: 'flex', alignItems: 'center', gap: 12 }}>
          <ScoreRing score={health.overallScore} color={health.color} />
          <div>
            <div className="kpi-label"><Gauge size={12} /> Health Score</div>
            <div className="kpi-value" style={{ color: health.color }}>
              {health.overallScore}<span style={{ fontSize: 14, color: 'var(--text-muted)', fontWeight: 400 }}>/100</span>
            </div>
            <div className="kpi-sub">Grade {health.grade} · {health.status}</div>
          </div>
        </div>
        <div className="kpi-card" style={{ borderTopColor: BAND_COLORS[analysis.riskBand] }}>
          <div className="kpi-label"><Activity size={12} /> Risk Score</div>
          <div className="kpi-value" style={{ color: BAND_COLORS[analysis.riskBand] }}>{score.riskScore.toFixed(2)}</div>
          <div className="progress-bar" style={{ marginTop: 8 }} role="progressbar" aria-valuenow={Math.round(score.riskScore * 100)} aria-valuemin={0} aria-valuemax={100}>
            <div className="progress-fill" style={{ width: `${score.riskScore * 100}%`, background: BAND_COLORS[analysis.riskBand] }} />
          </div>
          <div className="kpi-sub" style={{ textTransform: 'capitalize' }}>{analysis.riskBand} risk</div>
        </div>
        <div className="kpi-card" style={{ borderTopColor: 'var(--accent-blue)' }}>
          <div className="kpi-label"><TrendingUp size={12} /> Investment Readiness</div>
          <div className="kpi-value">{Math.round(score.investmentReadiness * 100)}%</div>
          <div className="progress-bar" style={{ marginTop: 8 }} role="progressbar" aria-valuenow={Math.round(score.investmentReadiness * 100)} aria-valuemin={0} aria-valuemax={100}>
            <div className="progress-fill" style={{ width: `${score.investmentReadiness * 100}%`, background: 'var(--accent-blue)' }} />
          </div>
          <div className="kpi-sub">{score.investmentReadiness >= 0.6 ? 'Ready to invest regularly' : 'Strengthen the basics first'}</div>
        </div>
        <div className="kpi-card" style={{ borderTopColor: score.insuranceGap > 0 ? 'var(--accent-red)' : 'var(--accent-emerald)' }}>
          <div className="kpi-label"><Shield size={12} /> Insurance Gap</div>
          <div className="kpi-value" style={{ color: score.insuranceGap > 0 ? 'var(--accent-red)' : 'var(--accent-emerald)' }}>{money(score.insuranceGap)}</div>
          <div className="kpi-sub">Recommended cover {money(features.requiredCoverage)}</div>
        </div>
      </div>

      {/* Main grid: health dimensions + risk factors */}
      <div style={{ display: 'grid', gridTemplateColumns: '1fr 360px', gap: 16, marginBottom: 20 }}>
        <div className="card">
          <div className="card-header"><span className="card-title">Health Breakdown</span></div>
          <div className="card-body">
            <ResponsiveContainer width="100%" height={220}>
              <BarChart data={dimensionData} layout="vertical" margin={{ left: 24, right: 16 }}>
                <XAxis type="number" domain={[0, 25]} tick={{ fill: 'var(--text-muted)', fontSize: 10 }} />
                <YAxis type="category" dataKey="name" width={120} tick={{ fill: 'var(--text-secondary)', fontSize: 11 }} />
                <Tooltip formatter={value => [String(value), 'Points']} />
                <Bar dataKey="points" radius={[0, 4, 4, 0]}>
                  {dimensionData.map(d => <Cell key={d.name} fill={barColor(d.points, d.maxPoints)} />)}
                </Bar>
              </BarChart>
            </ResponsiveContainer>
            <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fill, minmax(180px, 1fr))', gap: 8, marginTop: 12 }}>
              {health.dimensions.map(d => (
                <div key={d.id} style={{ fontSize: 11, color: 'var(--text-muted)' }}>
                  <span style={{ color: 'var(--text-secondary)' }}>{d.name}:</span> {d.detail}
                </div>
              ))}
            </div>
          </div>
        </div>

        <div className="card">
          <div className="card-header"><span className="card-title">Risk Factors</span></div>
          <div className="card-body">
            <ResponsiveContainer width="100%" height={220}>
              <BarChart data={riskData} margin={{ left: -16, right: 8 }}>
                <XAxis dataKey="factor" tick={{ fill: 'var(--text-muted)', fontSize: 10 }} interval={0} />
                <YAxis domain={[0, 10]} tick={{ fill: 'var(--text-muted)', fontSize: 10 }} />
                <Tooltip formatter={value => [String(value), 'Level']} />
                <Bar dataKey="level" radius={[4, 4, 0, 0]}>
                  {riskData.map(r => <Cell key={r.factor} fill={riskColor(r.level)} />)}
                </Bar>
              </BarChart>
            </ResponsiveContainer>
            <div style={{ fontSize: 10, color: 'var(--text-muted)', textAlign: 'center' }}>0 = no risk · 10 = severe</div>
          </div>
        </div>
      </div>

      {/* Actions, spending and ratios */}
      <div className="grid-3">
        <div className="card">
          <div className="card-header">
            <span className="card-title">Action Items</span>
            <button className="btn btn-ghost" style={{ fontSize: 11, padding: '4px 10px' }} onClick={() => onNavigate('advisor')}>
              <Bot size={12} /> Ask the Advisor <ChevronRight size={12} />
            </button>
          </div>
          <div className="card-body">
            {actionItems.length > 0 ? (
              <ol style={{ margin: 0, paddingLeft: 18, display: 'flex', flexDirection: 'column', gap: 10 }}>
                {actionItems.map(item => (
                  <li key={item} style={{ fontSize: 13, color: 'var(--text-primary)', lineHeight: 1.5 }}>{item}</li>
                ))}
              </ol>
            ) : (
              <div style={{ display: 'flex', gap: 8, alignItems: 'center', fontSize: 13, color: 'var(--accent-emerald)' }}>
                <CheckCircle2 size={16} /> Nothing urgent. Keep it up.
              </div>
            )}
          </div>
        </div>

        <div className="card">
          <div className="card-header"><span className="card-title"><Wallet size={14} /> Monthly Spending</span></div>
          <div className="card-body">
            <ResponsiveContainer width="100%" height={220}>
              <PieChart>
                <Pie data={expenses} dataKey="amount" nameKey="name" innerRadius={45} outerRadius={75} paddingAngle={2}>
                  {expenses.map((slice, i) => <Cell key={slice.name} fill={SLICE_COLORS[i % SLICE_COLORS.length]} />)}
                </Pie>
                <Tooltip formatter={value => money(Number(value))} />
                <Legend wrapperStyle={{ fontSize: 11 }} />
              </PieChart>
            </ResponsiveContainer>
          </div>
        </div>

        <div className="card">
          <div className="card-header"><span className="card-title"><PiggyBank size={14} /> Key Ratios</span></div>
          <div className="card-body">
            {[
              { label: 'Savings rate', value: pct(features.savingsRate) },
              { label: 'Debt to annual income', value: pct(features.debtToIncome) },
              { label: 'Expenses to income', value: pct(features.expenseRatio) },
              { label: 'Average debt interest', value: pct(features.weightedDebtRate) },
              { label: 'Emergency fund', value: `${features.emergencyMonths.toFixed(1)} months` },
              { label: 'Monthly surplus', value: money(features.monthlySurplus) },
            ].map(row => (
              <div key={row.label} style={{ display: 'flex', justifyContent: 'space-between', padding: '8px 0', borderBottom: '1px solid var(--border-subtle)', fontSize: 13 }}>
                <span style={{ color: 'var(--text-muted)' }}>{row.label}</span>
                <span style={{ fontFamily: 'var(--font-mono)', color: 'var(--text-primary)' }}>{row.value}</span>
              </div>
            ))}
          </div>
        </div>
      </div>
    </div>
  )
}
