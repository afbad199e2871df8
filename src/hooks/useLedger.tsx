import { createContext, useContext, useState, useEffect, useCallback, useMemo, type ReactNode } from 'react'
import { historyFromExchanges } from '../engine/ai-context'
import { APIError } from '../engine/api-client'
import { createLocalBackend, createRemoteBackend, invalidFields } from '../engine/backends'
import type { BackendKind, LedgerBackend } from '../engine/backends'
import { analyzeProfile, type ProfileAnalysis } from '../engine/insights'
import { BrowserDocumentStore, probeLocalStorage } from '../engine/local-store'
import { MemoryDocumentStore } from '../engine/persistence'
import { BASELINE_MODEL } from '../engine/scoring'
import type { FieldIssue } from '../engine/validation'
import type { AdvisoryExchange, FinancialProfile, ModelArtifact } from '../engine/types'

export type SaveResult =
  | { ok: true; warnings: FieldIssue[] }
  | { ok: false; message: string; fields: string[] }

interface LedgerContextType {
  backend: BackendKind
  loading: boolean
  loadError: string | null
  profile: FinancialProfile | null
  saveProfile: (profile: FinancialProfile) => Promise<SaveResult>
  // Computed values
  model: ModelArtifact
  analysis: ProfileAnalysis | null
  analysisError: string | null
  // Advisor
  exchanges: AdvisoryExchange[]
  asking: boolean
  advisorNotice: string | null
  ask: (question: string) => Promise<void>
  exportTranscript: () => Promise<string>
}

const LedgerContext = createContext<LedgerContextType | null>(null)

function describeError(e: unknown): string {
  if (e instanceof Error) return e.message
  return 'Something went wrong'
}

function createBackend(kind: BackendKind): LedgerBackend {
  if (kind === 'remote') return createRemoteBackend()
  const storage = probeLocalStorage()
  return createLocalBackend(storage ? new BrowserDocumentStore(storage) : new MemoryDocumentStore())
}

export function LedgerProvider({ backend: kind, children }: { backend: BackendKind; children: ReactNode }) {
  const backend = useMemo(() => createBackend(kind), [kind])

  const [profile, setProfile] = useState<FinancialProfile | null>(null)
  const [model, setModel] = useState<ModelArtifact>(BASELINE_MODEL)
  const [exchanges, setExchanges] = useState<AdvisoryExchange[]>([])
  const [loading, setLoading] = useState(true)
  const [loadError, setLoadError] = useState<string | null>(null)
  const [asking, setAsking] = useState(false)
  const [advisorNotice, setAdvisorNotice] = useState<string | null>(null)

  // Load on mount and whenever the backend changes
  useEffect(() => {
    let cancelled = false
    setLoading(true)
    setLoadError(null)

    async function load() {
      const [savedProfile, latest, history] = await Promise.all([
        backend.loadProfile(),
        // Scoring still works against the baseline if the registry is unreachable
        backend.latestModel().catch(e => {
          console.warn('[Ledger] Using baseline model:', describeError(e))
          return BASELINE_MODEL
        }),
        backend.history(),
      ])
      if (cancelled) return
      setProfile(savedProfile)
      setModel(latest)
      setExchanges(history)
    }

    load()
      .catch(e => { if (!cancelled) setLoadError(describeError(e)) })
      .finally(() => { if (!cancelled) setLoading(false) })
    return () => { cancelled = true }
  }, [backend])

  // ---- Profile ----

  const saveProfile = useCallback(async (next: FinancialProfile): Promise<SaveResult> => {
    try {
      const saved = await backend.saveProfile(next)
      setProfile(saved.profile)
      return { ok: true, warnings: saved.warnings }
    } catch (e) {
      return { ok: false, message: describeError(e), fields: invalidFields(e) }
    }
  }, [backend])

  // ---- Computed values ----

  const { analysis, analysisError } = useMemo(() => {
    if (!profile) return { analysis: null, analysisError: null }
    try {
      return { analysis: analyzeProfile(profile, model), analysisError: null }
    } catch (e) {
      return { analysis: null, analysisError: describeError(e) }
    }
  }, [profile, model])

  // ---- Advisor ----

  const ask = useCallback(async (question: string) => {
    setAsking(true)
    setAdvisorNotice(null)
    try {
      const outcome = await backend.ask(question, historyFromExchanges(exchanges))
      setExchanges(prev => [...prev, outcome.exchange])
      if (outcome.unavailable) setAdvisorNotice(outcome.unavailable)
    } catch (e) {
      setAdvisorNotice(e instanceof APIError && e.status === 0
        ? 'Could not reach the server. Your question was not sent.'
        : describeError(e))
    } finally {
      setAsking(false)
    }
  }, [backend, exchanges])

  const exportTranscript = useCallback(() => backend.exportTranscript(), [backend])

  return (
    <LedgerContext.Provider value={{
      backend: backend.kind,
      loading, loadError,
      profile, saveProfile,
      model, analysis, analysisError,
      exchanges, asking, advisorNotice, ask, exportTranscript,
    }}>
      {children}
    </LedgerContext.Provider>
  )
}

export function useLedger() {
  const ctx = useContext(LedgerContext)
  if (!ctx) throw new Error('useLedger must be used within LedgerProvider')
  return ctx
}
