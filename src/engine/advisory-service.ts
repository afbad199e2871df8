/**
 * Ledgerwise - Advisory Service
 *
 * Per-request flow for a chat question: load profile, score it against the
 * current model, ask the advisor, record the exchange. An advisor failure
 * is recorded and reported; it never prevents the exchange being saved.
 */

import { buildAdvisoryContext } from './ai-context'
import type { ChatTurn } from './ai-context'
import type { AdvisoryProvider } from './ai-providers'
import { UpstreamError, ValidationError } from './errors'
import { buildFeatures } from './feature-builder'
import { silentLogger } from './logger'
import type { Logger } from './logger'
import type { ModelRegistry } from './model-registry'
import type { ProfileRepository } from './persistence'
import { scoreFeatures } from './scoring'
import type { AdvisoryExchange } from './types'

export const MAX_QUESTION_LENGTH = 2000

export interface AdvisoryServiceDeps {
  profiles: ProfileRepository
  models: ModelRegistry
  advisor: AdvisoryProvider
  log?: Logger
  now?: () => Date
  newId?: () => string
}

export interface AdvisoryOutcome {
  exchange: AdvisoryExchange
  /** Set when the advisor failed; the exchange was still recorded */
  error?: UpstreamError
}

export class AdvisoryService {
  private log: Logger
  private now: () => Date
  private newId: () => string

  constructor(private deps: AdvisoryServiceDeps) {
    this.log = deps.log ?? silentLogger
    this.now = deps.now ?? (() => new Date())
    this.newId = deps.newId ?? (() => crypto.randomUUID())
  }

  async ask(userId: string, question: string, history: ChatTurn[] = []): Promise<AdvisoryOutcome> {
    const trimmed = question.trim()
    if (!trimmed || trimmed.length > MAX_QUESTION_LENGTH) {
      throw new ValidationError(`Question must be 1-${MAX_QUESTION_LENGTH} characters`, ['question'])
    }

    const profile = await this.deps.profiles.getProfile(userId)
    if (!profile) {
      throw new ValidationError('Save your financial profile before asking the advisor', ['profile'])
    }

    const features = buildFeatures(profile)
    const model = await this.deps.models.latest()
    const score = scoreFeatures(features, model)
    const context = buildAdvisoryContext(profile, features, score)

    let answer: string | null = null
    let provider: AdvisoryExchange['provider'] = 'unavailable'
    let error: UpstreamError | undefined
    try {
      const result = await this.deps.advisor.ask({ question: trimmed, context, history })
      answer = result.text
      provider = result.provider
    } catch (e) {
      if (!(e instanceof UpstreamError)) throw e
      this.log.warn(`advisor unavailable (${e.reason}): ${e.message}`)
      error = e
    }

    const exchange: AdvisoryExchange = {
      id: this.newId(),
      question: trimmed,
      context,
      answer,
      provider,
      timestamp: this.now().toISOString(),
    }
    await this.deps.profiles.appendExchange(userId, exchange)
    return error ? { exchange, error } : { exchange }
  }
}

/** Plain-text transcript for download */
export function exportTranscript(exchanges: AdvisoryExchange[], exportedAt: Date = new Date()): string {
  const lines = ['Financial advisor conversation', `Exported: ${exportedAt.toISOString()}`, '']
  for (const x of exchanges) {
    lines.push(`[${x.timestamp}] You: ${x.question}`)
    lines.push(`[${x.timestamp}] Advisor: ${x.answer ?? '(advice unavailable)'}`)
    lines.push('')
  }
  return lines.join('\n')
}
