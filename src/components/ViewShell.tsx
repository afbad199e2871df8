/**
 * Ledgerwise - View Shell
 *
 * Wraps every view with an error boundary, a loading skeleton and the
 * empty state for views that need a saved profile.
 */

import { type ReactNode, Suspense } from 'react'
import type { ViewKey } from '../App'
import { useLedger } from '../hooks/useLedger'
import { EmptyState } from './EmptyState'
import { SkeletonDashboard } from './SkeletonLoader'
import { ErrorBoundary } from './ErrorBoundary'

interface ViewShellProps {
  view: ViewKey
  onNavigate: (view: ViewKey) => void
  children: ReactNode
}

// Everything but the profile editor reads the saved profile
const NEEDS_PROFILE: ReadonlySet<ViewKey> = new Set<ViewKey>(['dashboard', 'forecast', 'advisor'])

export function ViewShell({ view, onNavigate, children }: ViewShellProps) {
  const { profile, loading } = useLedger()
  const showEmpty = !loading && !profile && NEEDS_PROFILE.has(view)

  return (
    <ErrorBoundary key={view} view={view} onLeave={view === 'dashboard' ? undefined : () => onNavigate('dashboard')}>
      <Suspense fallback={<SkeletonDashboard />}>
        {loading ? <SkeletonDashboard /> : showEmpty ? <EmptyState view={view} onNavigate={onNavigate} /> : children}
      </Suspense>
    </ErrorBoundary>
  )
}
