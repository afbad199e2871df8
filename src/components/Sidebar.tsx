/**
 * Ledgerwise - Sidebar
 * Primary navigation, the health score summary and the account control.
 */

import { type ReactNode } from 'react'
import {
  LayoutDashboard, UserCog, TrendingUp, Bot, Wallet,
  ChevronLeft, ChevronRight, LogOut, LogIn, HardDrive,
} from 'lucide-react'
import { type ViewKey } from '../App'
import { useAuth } from '../context/AuthContext'
import { useLedger } from '../hooks/useLedger'

interface NavItem {
  key: ViewKey
  label: string
  icon: ReactNode
}

const NAV_ITEMS: NavItem[] = [
  { key: 'dashboard', label: 'Dashboard', icon: <LayoutDashboard size={18} /> },
  { key: 'profile', label: 'My Finances', icon: <UserCog size={18} /> },
  { key: 'forecast', label: 'Forecast', icon: <TrendingUp size={18} /> },
  { key: 'advisor', label: 'AI Advisor', icon: <Bot size={18} /> },
]

export function viewLabel(view: ViewKey): string {
  return NAV_ITEMS.find(item => item.key === view)?.label ?? view
}

interface SidebarProps {
  activeView: ViewKey
  onNavigate: (view: ViewKey) => void
  collapsed: boolean
  onToggle: () => void
}

function scoreColor(score: number): string {
  if (score >= 70) return 'var(--accent-emerald)'
  if (score >= 50) return 'var(--accent-gold)'
  return 'var(--accent-red)'
}

export function Sidebar({ activeView, onNavigate, collapsed, onToggle }: SidebarProps) {
  const { analysis } = useLedger()
  const { user, isOfflineMode, logout, connectAccount } = useAuth()
  const health = analysis?.health
  const actionCount = analysis?.actionItems.length ?? 0

  return (
    <aside className={`sidebar ${collapsed ? 'collapsed' : ''}`} role="navigation" aria-label="Main navigation" style={{
      position: 'fixed', left: 0, top: 0, bottom: 0,
      width: collapsed ? 'var(--sidebar-collapsed)' : 'var(--sidebar-width)',
      background: 'var(--bg-primary)', borderRight: '1px solid var(--border-subtle)',
      display: 'flex', flexDirection: 'column', zIndex: 10,
      transition: 'width 0.4s var(--ease-out)', overflow: 'hidden',
    }}>
      {/* Logo */}
      <div style={{ padding: collapsed ? '24px 16px' : '24px', display: 'flex', alignItems: 'center', gap: 12, borderBottom: '1px solid var(--border-subtle)', minHeight: 72 }}>
        <div style={{ width: 36, height: 36, borderRadius: 10, background: 'linear-gradient(135deg, var(--accent-emerald), #059669)', display: 'flex', alignItems: 'center', justifyContent: 'center', flexShrink: 0 }}>
          <Wallet size={20} color="#0c0e12" strokeWidth={2.5} />
        </div>
        {!collapsed && (
          <div style={{ overflow: 'hidden', whiteSpace: 'nowrap' }}>
            <div style={{ fontFamily: 'var(--font-display)', fontSize: 20, color: 'var(--accent-emerald)', lineHeight: 1.1 }}>Ledgerwise</div>
            <div style={{ fontFamily: 'var(--font-mono)', fontSize: 10, color: 'var(--text-muted)', textTransform: 'uppercase', letterSpacing: '0.15em' }}>Personal Finance</div>
          </div>
        )}
      </div>

      {/* Navigation */}
      <nav style={{ flex: 1, padding: 8, display: 'flex', flexDirection: 'column', gap: 2 }} aria-label="Views">
        {NAV_ITEMS.map(item => {
          const isActive = activeView === item.key
          return (
            <button key={item.key} onClick={() => onNavigate(item.key)} title={collapsed ? item.label : undefined} aria-label={item.label} aria-current={isActive ? 'page' : undefined} style={{
              display: 'flex', alignItems: 'center', gap: 12, padding: collapsed ? '10px 14px' : '8px 16px', borderRadius: 10, border: 'none',
              background: isActive ? 'var(--accent-emerald-dim)' : 'transparent', color: isActive ? 'var(--accent-emerald)' : 'var(--text-secondary)',
              cursor: 'pointer', fontFamily: 'var(--font-body)', fontSize: 13, fontWeight: isActive ? 500 : 400,
              textAlign: 'left', position: 'relative', justifyContent: collapsed ? 'center' : 'flex-start', width: '100%', minHeight: 36,
            }}>
              <span style={{ flexShrink: 0, display: 'flex' }} aria-hidden="true">{item.icon}</span>
              {!collapsed && <span>{item.label}</span>}
              {isActive && <div style={{ position: 'absolute', left: 0, top: '50%', transform: 'translateY(-50%)', width: 3, height: 20, borderRadius: 2, background: 'var(--accent-emerald)' }} aria-hidden="true" />}
              {item.key === 'dashboard' && actionCount > 0 && !collapsed && (
                <span aria-label={`${actionCount} action items`} style={{ marginLeft: 'auto', background: 'var(--accent-red)', color: '#fff', fontSize: 10, fontWeight: 600, width: 18, height: 18, borderRadius: 9, display: 'flex', alignItems: 'center', justifyContent: 'center' }}>
                  {actionCount}
                </span>
              )}
            </button>
          )
        })}
      </nav>

      {/* Health score */}
      {!collapsed && health && (
        <div style={{ margin: '0 12px 8px', padding: 14, background: 'var(--bg-elevated)', borderRadius: 12, border: '1px solid var(--border-subtle)' }} role="status" aria-label={`Financial health: ${health.overallScore}/100`}>
          <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', marginBottom: 10 }}>
            <span style={{ fontSize: 11, textTransform: 'uppercase', letterSpacing: '0.08em', color: 'var(--text-muted)', fontWeight: 500 }}>Financial Health</span>
            <span style={{ fontFamily: 'var(--font-mono)', fontSize: 18, fontWeight: 600, color: scoreColor(health.overallScore) }}>{health.overallScore}</span>
          </div>
          <div className="progress-bar" role="progressbar" aria-valuenow={health.overallScore} aria-valuemin={0} aria-valuemax={100}>
            <div className="progress-fill" style={{ width: `${health.overallScore}%`, background: scoreColor(health.overallScore) }} />
          </div>
          <div style={{ marginTop: 8, fontSize: 11, color: 'var(--text-muted)' }}>Grade: {health.grade} · {health.status}</div>
        </div>
      )}

      {/* Account */}
      {!collapsed && (
        <div style={{ margin: '0 12px 8px', padding: '8px 10px', borderRadius: 8, background: 'var(--bg-surface)', display: 'flex', alignItems: 'center', gap: 8, fontSize: 11, color: 'var(--text-muted)' }}>
          {isOfflineMode ? <HardDrive size={12} aria-hidden="true" /> : null}
          <span style={{ flex: 1, overflow: 'hidden', textOverflow: 'ellipsis', whiteSpace: 'nowrap' }}>
            {isOfflineMode ? 'Saved on this device' : user?.display_name || user?.email}
          </span>
          {isOfflineMode ? (
            <button onClick={connectAccount} aria-label="Sign in" style={{ background: 'none', border: 'none', cursor: 'pointer', color: 'var(--accent-emerald)', display: 'flex' }}>
              <LogIn size={14} />
            </button>
          ) : (
            <button onClick={() => { logout().catch(e => console.error('[Auth] logout failed', e)) }} aria-label="Sign out" style={{ background: 'none', border: 'none', cursor: 'pointer', color: 'var(--text-muted)', display: 'flex' }}>
              <LogOut size={14} />
            </button>
          )}
        </div>
      )}

      <button onClick={onToggle} aria-label={collapsed ? 'Expand sidebar' : 'Collapse sidebar'} style={{ padding: '16px', background: 'transparent', border: 'none', borderTop: '1px solid var(--border-subtle)', cursor: 'pointer', color: 'var(--text-muted)', display: 'flex', alignItems: 'center', justifyContent: collapsed ? 'center' : 'flex-end' }}>
        {collapsed ? <ChevronRight size={16} /> : <ChevronLeft size={16} />}
      </button>
    </aside>
  )
}
