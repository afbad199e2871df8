import { useState, useEffect, useCallback, lazy } from 'react'
import { AlertTriangle } from 'lucide-react'
import { AuthProvider, useAuth } from './context/AuthContext'
import { LedgerProvider, useLedger } from './hooks/useLedger'
import { AuthScreen } from './views/AuthScreen'
import { ViewShell } from './components/ViewShell'
import { Sidebar } from './components/Sidebar'
import { ToastProvider } from './components/ToastSystem'
import './App.css'

// ─── Code-split views (React.lazy) ─────────────────────────────────────────
// Dashboard and the profile editor load eagerly, the rest on demand
import { Dashboard } from './views/Dashboard'
import { DataSetup } from './views/DataSetup'

const Forecast = lazy(() => import('./views/Forecast').then(m => ({ default: m.Forecast })))
const AIAdvisor = lazy(() => import('./views/AIAdvisor').then(m => ({ default: m.AIAdvisor })))

export type ViewKey = 'dashboard' | 'profile' | 'forecast' | 'advisor'

function AppInner() {
  const { loading, loadError, profile } = useLedger()
  const [activeView, setActiveView] = useState<ViewKey>('dashboard')
  const [sidebarCollapsed, setSidebarCollapsed] = useState(false)
  const [redirected, setRedirected] = useState(false)

  // First visit with nothing saved goes straight to the profile editor
  useEffect(() => {
    if (loading || redirected) return
    if (!profile && !loadError) setActiveView('profile')
    setRedirected(true)
  }, [loading, redirected, profile, loadError])

  const toggleSidebar = useCallback(() => setSidebarCollapsed(prev => !prev), [])

  const renderView = () => {
    switch (activeView) {
      case 'profile': return <DataSetup onSaved={() => setActiveView('dashboard')} />
      case 'forecast': return <Forecast />
      case 'advisor': return <AIAdvisor />
      default: return <Dashboard onNavigate={setActiveView} />
    }
  }

  return (
    <div className="app-root">
      <a href="#main-content" className="skip-to-content">Skip to main content</a>

      <Sidebar
        activeView={activeView}
        onNavigate={setActiveView}
        collapsed={sidebarCollapsed}
        onToggle={toggleSidebar}
      />
      <main
        id="main-content"
        className={`main-content ${sidebarCollapsed ? 'expanded' : ''}`}
        role="main"
        aria-label={`${activeView} view`}
      >
        {loadError && (
          <div className="urgency-bar warning" role="alert">
            <AlertTriangle size={14} />
            <span>Your saved data could not be loaded: {loadError}</span>
          </div>
        )}
        <ViewShell view={activeView} onNavigate={setActiveView}>
          {renderView()}
        </ViewShell>
      </main>
    </div>
  )
}

function AuthGate() {
  const { isLoggedIn, isLoading, isOfflineMode } = useAuth()

  if (isLoading) {
    return (
      <div style={{
        minHeight: '100vh', display: 'flex', alignItems: 'center', justifyContent: 'center',
        background: 'var(--bg-void)', fontFamily: 'var(--font-body)',
      }}>
        <div style={{ fontSize: '0.9rem', color: 'var(--text-muted)' }}>Loading Ledgerwise...</div>
      </div>
    )
  }

  if (!isLoggedIn && !isOfflineMode) {
    return <AuthScreen />
  }

  const backend = isOfflineMode ? 'local' : 'remote'
  return (
    <LedgerProvider key={backend} backend={backend}>
      <AppInner />
    </LedgerProvider>
  )
}

function App() {
  return (
    <ToastProvider>
      <AuthProvider>
        <AuthGate />
      </AuthProvider>
    </ToastProvider>
  )
}

export default App
