/**
 * Ledgerwise - Toasts
 * Shows the notices from engine/notices in the corner of the screen.
 */

import { createContext, useCallback, useContext, useEffect, useRef, useState, type ReactNode } from 'react'
import { AlertTriangle, CheckCircle2, Info, X, XCircle } from 'lucide-react'
import { queueNotice, type Notice, type NoticeTone } from '../engine/notices'

type Notify = (notice: Notice) => void

interface ShownNotice extends Notice {
  id: number
}

const NotifyContext = createContext<Notify | null>(null)

export function useNotify(): Notify {
  const notify = useContext(NotifyContext)
  if (!notify) throw new Error('useNotify must be used within ToastProvider')
  return notify
}

export function ToastProvider({ children }: { children: ReactNode }) {
  const [shown, setShown] = useState<ShownNotice[]>([])
  const lastId = useRef(0)

  const notify = useCallback((notice: Notice) => {
    const id = ++lastId.current
    setShown(prev => queueNotice(prev, { ...notice, id }))
  }, [])

  const dismiss = useCallback((id: number) => {
    setShown(prev => prev.filter(n => n.id !== id))
  }, [])

  return (
    <NotifyContext.Provider value={notify}>
      {children}
      <div aria-live="polite" style={{
        position: 'fixed', bottom: 20, right: 20, zIndex: 9997, width: 360,
        display: 'flex', flexDirection: 'column', gap: 8, pointerEvents: 'none',
      }}>
        {shown.map(n => <NoticeCard key={n.id} notice={n} onDismiss={dismiss} />)}
      </div>
    </NotifyContext.Provider>
  )
}

const TONE_STYLE: Record<NoticeTone, { icon: ReactNode; color: string }> = {
  success: { icon: <CheckCircle2 size={16} />, color: 'var(--accent-emerald)' },
  warning: { icon: <AlertTriangle size={16} />, color: 'var(--accent-amber)' },
  error: { icon: <XCircle size={16} />, color: 'var(--accent-red)' },
  info: { icon: <Info size={16} />, color: 'var(--accent-blue)' },
}

function NoticeCard({ notice, onDismiss }: { notice: ShownNotice; onDismiss: (id: number) => void }) {
  const { icon, color } = TONE_STYLE[notice.tone]

  useEffect(() => {
    if (notice.duration <= 0) return
    const timer = setTimeout(() => onDismiss(notice.id), notice.duration)
    return () => clearTimeout(timer)
  }, [notice.id, notice.duration, onDismiss])

  return (
    <div role={notice.tone === 'error' ? 'alert' : 'status'} style={{
      pointerEvents: 'auto',
      display: 'flex', gap: 10, alignItems: 'flex-start',
      padding: '12px 14px',
      background: 'var(--bg-elevated)',
      borderRadius: 12,
      borderLeft: `3px solid ${color}`,
      boxShadow: '0 8px 32px rgba(0,0,0,0.3)',
      animation: 'toastSlideIn 0.3s var(--ease-spring)',
    }}>
      <span style={{ color, flexShrink: 0, marginTop: 1 }}>{icon}</span>
      <div style={{ flex: 1, minWidth: 0 }}>
        <div style={{ fontSize: 13, fontWeight: 500, color: 'var(--text-primary)' }}>{notice.title}</div>
        {notice.detail && (
          <div style={{ fontSize: 12, color: 'var(--text-secondary)', marginTop: 2, lineHeight: 1.4 }}>{notice.detail}</div>
        )}
      </div>
      <button onClick={() => onDismiss(notice.id)} aria-label="Dismiss" style={{
        background: 'none', border: 'none', cursor: 'pointer', color: 'var(--text-muted)', padding: 2,
      }}>
        <X size={13} />
      </button>
    </div>
  )
}
