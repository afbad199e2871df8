/**
 * Ledgerwise - Dashboard Backends
 *
 * The dashboard talks to one of two implementations, picked when the
 * session starts: the Netlify API for signed-in users, or the engine
 * running in the browser over local storage with the offline advisor.
 */

import { AdvisoryService, exportTranscript } from './advisory-service'
import type { ChatTurn } from './ai-context'
import { OfflineAdvisor } from './ai-providers'
import { AdvisorAPI, APIError, ModelsAPI, ProfileAPI } from './api-client'
import { ValidationError } from './errors'
import { ModelRegistry } from './model-registry'
import { ProfileRepository } from './persistence'
import type { DocumentStore } from './persistence'
import { freezeArtifact } from './scoring'
import { validateProfile } from './validation'
import type { FieldIssue } from './validation'
import type { AdvisoryExchange, FinancialProfile, ModelArtifact } from './types'

export type BackendKind = 'remote' | 'local'

export interface SavedProfile {
  profile: FinancialProfile
  warnings: FieldIssue[]
}

export interface AskOutcome {
  exchange: AdvisoryExchange
  /** Set when no advice could be produced; the question was still recorded */
  unavailable?: string
}

export interface LedgerBackend {
  readonly kind: BackendKind
  loadProfile(): Promise<FinancialProfile | null>
  saveProfile(profile: FinancialProfile): Promise<SavedProfile>
  latestModel(): Promise<ModelArtifact>
  ask(question: string, history: ChatTurn[]): Promise<AskOutcome>
  history(): Promise<AdvisoryExchange[]>
  exportTranscript(): Promise<string>
}

/** Field paths named by a rejected save, from either backend */
export function invalidFields(e: unknown): string[] {
  if (e instanceof ValidationError || e instanceof APIError) return e.fields
  return []
}

// ─── Remote ───────────────────────────────────────────────────────────────

export function createRemoteBackend(): LedgerBackend {
  return {
    kind: 'remote',
    loadProfile: () => ProfileAPI.load(),
    async saveProfile(profile) {
      const { profile: saved, warnings } = await ProfileAPI.save(profile)
      return { profile: saved, warnings }
    },
    async latestModel() {
      const { model } = await ModelsAPI.latest()
      return freezeArtifact(model)
    },
    async ask(question, history) {
      const { exchange, advisorError } = await AdvisorAPI.ask(question, history)
      return advisorError ? { exchange, unavailable: advisorError.message } : { exchange }
    },
    history: () => AdvisorAPI.history(),
    exportTranscript: () => AdvisorAPI.exportTranscript(),
  }
}

// ─── Local ────────────────────────────────────────────────────────────────

export const LOCAL_USER_ID = 'local'
const LOCAL_HISTORY_LIMIT = 1000

export function createLocalBackend(store: DocumentStore, now?: () => Date): LedgerBackend {
  const profiles = new ProfileRepository(store, { now })
  const models = new ModelRegistry(store, undefined, now)
  const advisory = new AdvisoryService({ profiles, models, advisor: new OfflineAdvisor(), now })

  return {
    kind: 'local',
    loadProfile: () => profiles.getProfile(LOCAL_USER_ID),
    async saveProfile(profile) {
      const result = validateProfile(profile)
      if (!result.valid) {
        throw new ValidationError('Profile is invalid', result.errors.map(e => e.path))
      }
      const saved = await profiles.putProfile(LOCAL_USER_ID, result.data)
      return { profile: saved, warnings: result.warnings }
    },
    latestModel: () => models.latest(),
    async ask(question, history) {
      const outcome = await advisory.ask(LOCAL_USER_ID, question, history)
      return outcome.error ? { exchange: outcome.exchange, unavailable: outcome.error.message } : { exchange: outcome.exchange }
    },
    history: () => profiles.listExchanges(LOCAL_USER_ID),
    async exportTranscript() {
      return exportTranscript(await profiles.listExchanges(LOCAL_USER_ID, LOCAL_HISTORY_LIMIT))
    },
  }
}
