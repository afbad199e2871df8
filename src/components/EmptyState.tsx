/**
 * Ledgerwise - Empty State Component
 * Shown in place of a view that needs a saved profile before it can render.
 */

import { type ReactNode } from 'react'
import type { ViewKey } from '../App'
import { LayoutDashboard, TrendingUp, Bot, ArrowRight, Sparkles } from 'lucide-react'

// ─── Empty State Configs per View ───────────────────────────────────

interface EmptyConfig {
  icon: ReactNode
  iconBg: string
  title: string
  description: string
  ctaLabel: string
}

const EMPTY_CONFIGS: Partial<Record<ViewKey, EmptyConfig>> = {
  dashboard: {
    icon: <LayoutDashboard size={28} />,
    iconBg: 'linear-gradient(135deg, var(--accent-emerald), #059669)',
    title: 'Welcome to Ledgerwise',
    description: 'Enter your income, expenses, debts and cover to see your health score, risk profile and a prioritized action list.',
    ctaLabel: 'Enter My Finances',
  },
  forecast: {
    icon: <TrendingUp size={28} />,
    iconBg: 'linear-gradient(135deg, var(--accent-blue), #2563eb)',
    title: 'No forecast yet',
    description: 'Your 1, 3 and 10 year savings projections are built from your profile. Add it to get started.',
    ctaLabel: 'Enter My Finances',
  },
  advisor: {
    icon: <Bot size={28} />,
    iconBg: 'linear-gradient(135deg, var(--accent-purple), #7c3aed)',
    title: 'The advisor needs your numbers',
    description: 'Answers are grounded in your own income, savings, debt and cover. Save your profile first.',
    ctaLabel: 'Enter My Finances',
  },
}

const DEFAULT_EMPTY: EmptyConfig = {
  icon: <Sparkles size={28} />,
  iconBg: 'linear-gradient(135deg, var(--accent-gold), #b8912e)',
  title: 'Nothing here yet',
  description: 'Complete your financial profile to unlock this view.',
  ctaLabel: 'Get Started',
}

// ─── Component ──────────────────────────────────────────────────────

interface EmptyStateProps {
  view: ViewKey
  onNavigate: (view: ViewKey) => void
}

export function EmptyState({ view, onNavigate }: EmptyStateProps) {
  const config = EMPTY_CONFIGS[view] ?? DEFAULT_EMPTY

  return (
    <div className="empty-state" role="status" aria-label={`${config.title}: ${config.description}`}>
      <div className="empty-state-icon" style={{ background: config.iconBg, color: '#fff' }}>
        {config.icon}
      </div>
      <div className="empty-state-title">{config.title}</div>
      <div className="empty-state-description">{config.description}</div>
      <button className="empty-state-cta" onClick={() => onNavigate('profile')} aria-label={config.ctaLabel}>
        {config.ctaLabel}
        <ArrowRight size={16} />
      </button>
    </div>
  )
}
