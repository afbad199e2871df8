/**
 * Ledgerwise - AI Advisor Providers
 *
 * Two implementations of one interface: Gemini over REST, and an offline
 * advisor that answers from the computed scores. Which one serves requests
 * is decided once, from configuration.
 */

import { z } from 'zod'
import { buildAdvisorPrompt, money, pct, recentHistory } from './ai-context'
import type { ChatTurn, QuestionTopic } from './ai-context'
import { UpstreamError } from './errors'
import { silentLogger } from './logger'
import type { Logger } from './logger'
import { withRetry } from './resilience'
import type { Sleep } from './resilience'
import { riskBand } from './scoring'
import type { AdvisoryContext, AdvisorProviderId } from './types'

// ─── Types ────────────────────────────────────────────────────────────────

export interface AdvisoryRequest {
  question: string
  context: AdvisoryContext
  history?: ChatTurn[]
}

export interface AdvisoryAnswer {
  text: string
  provider: AdvisorProviderId
  model: string
  usage?: { input_tokens: number; output_tokens: number }
}

export interface AdvisoryProvider {
  readonly id: AdvisorProviderId
  ask(request: AdvisoryRequest): Promise<AdvisoryAnswer>
}

// ─── Gemini ───────────────────────────────────────────────────────────────

export const GEMINI_ENDPOINT = 'https://generativelanguage.googleapis.com/v1beta/models'

export interface GeminiOptions {
  apiKey: string
  model: string
  /** Per-attempt timeout */
  timeoutMs: number
  maxRetries: number
  backoffMs?: number
  fetch?: typeof fetch
  sleep?: Sleep
  log?: Logger
}

const geminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).min(1),
    }),
  })).min(1),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
  }).optional(),
})

const geminiErrorSchema = z.object({
  error: z.object({ message: z.string() }),
})

export class GeminiAdvisor implements AdvisoryProvider {
  readonly id = 'gemini' as const
  private fetchImpl: typeof fetch
  private log: Logger

  constructor(private options: GeminiOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis)
    this.log = options.log ?? silentLogger
  }

  async ask(request: AdvisoryRequest): Promise<AdvisoryAnswer> {
    if (!this.options.apiKey) {
      throw new UpstreamError('Gemini API key is not configured', 'advisor', 'config')
    }
    const prompt = buildAdvisorPrompt(request.question, request.context)
    const contents = [...recentHistory(request.history ?? []), { role: 'user' as const, content: prompt.user }]
      .map(turn => ({
        role: turn.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: turn.content }],
      }))

    const payload = {
      contents,
      systemInstruction: { parts: [{ text: prompt.system }] },
      generationConfig: { maxOutputTokens: 1024, temperature: 0.7 },
    }

    return withRetry(
      attempt => this.generate(payload, attempt),
      {
        retries: this.options.maxRetries,
        baseDelayMs: this.options.backoffMs ?? 1000,
        sleep: this.options.sleep,
        log: this.log,
      },
    )
  }

  private async generate(payload: object, attempt: number): Promise<AdvisoryAnswer> {
    const { model, apiKey, timeoutMs } = this.options
    const url = `${GEMINI_ENDPOINT}/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey)}`

    let res: Response
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (e) {
      if (e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError')) {
        throw new UpstreamError(`Gemini did not respond within ${timeoutMs}ms`, 'advisor', 'timeout')
      }
      throw new UpstreamError(`Gemini request failed: ${e instanceof Error ? e.message : String(e)}`, 'advisor', 'network')
    }

    let body: unknown = null
    try {
      body = await res.json()
    } catch (e) {
      if (e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError')) {
        throw new UpstreamError(`Gemini response body did not arrive within ${timeoutMs}ms`, 'advisor', 'timeout')
      }
      this.log.debug(`attempt ${attempt + 1} returned a body that is not JSON`)
    }

    if (!res.ok) {
      const parsed = geminiErrorSchema.safeParse(body)
      const message = parsed.success ? parsed.data.error.message : `Gemini error: ${res.status}`
      this.log.warn(`attempt ${attempt + 1} got HTTP ${res.status}`)
      throw new UpstreamError(message, 'advisor', res.status === 429 ? 'quota' : 'http', res.status)
    }

    const parsed = geminiResponseSchema.safeParse(body)
    const text = parsed.success
      ? parsed.data.candidates[0].content.parts.map(p => p.text ?? '').join('').trim()
      : ''
    if (!parsed.success || !text) {
      throw new UpstreamError('Gemini returned no answer text', 'advisor', 'malformed')
    }

    const usage = parsed.data.usageMetadata
    return {
      text,
      provider: 'gemini',
      model,
      usage: usage ? {
        input_tokens: usage.promptTokenCount ?? 0,
        output_tokens: usage.candidatesTokenCount ?? 0,
      } : undefined,
    }
  }
}

// ─── Offline ──────────────────────────────────────────────────────────────

const TOPIC_ADVICE: Record<QuestionTopic, (c: AdvisoryContext) => string> = {
  vacation: (c: AdvisoryContext) => c.profile.monthlySurplus > 0
    ? `Setting aside ${money(c.profile.monthlySurplus)} a month (your current surplus) builds a travel fund without touching savings or taking on debt.`
    : 'Your expenses and savings already use all of your income, so fund a trip by trimming variable spending first rather than borrowing.',
  emergency: (c: AdvisoryContext) => {
    const target = c.profile.monthlyExpenses * 6
    const missing = Math.max(0, target - c.profile.emergencyFund)
    return missing > 0
      ? `A six-month emergency fund for you is about ${money(target)}; you are ${money(missing)} short.`
      : `Your emergency fund of ${money(c.profile.emergencyFund)} already covers six months of expenses.`
  },
  home: (c: AdvisoryContext) => `Before a home purchase, keep total debt (now ${money(c.profile.totalDebt)}) low enough that a mortgage does not push your risk score up, and save a down payment separately from your emergency fund.`,
  retirement: (c: AdvisoryContext) => `At ${c.profile.age}, consistent contributions matter more than timing. Directing part of your ${money(c.profile.monthlySavings)} monthly savings into tax-advantaged retirement accounts is a sound default.`,
  debt: (c: AdvisoryContext) => c.profile.totalDebt > 0
    ? `Pay minimums on everything and put extra money toward the highest-rate balance first; your total debt is ${money(c.profile.totalDebt)}.`
    : 'You have no recorded debt, so your savings can go straight to your emergency fund and investments.',
  insurance: (c: AdvisoryContext) => c.score.insuranceGap > 0
    ? `Your insurance gap is about ${money(c.score.insuranceGap)}. Term life cover is usually the cheapest way to close it.`
    : 'Your insurance coverage meets the recommended amount for your income and dependents.',
  investment: (c: AdvisoryContext) => c.score.investmentReadiness >= 0.6
    ? 'Your readiness is high enough for regular investing; diversified index funds are a simple starting point.'
    : 'Strengthen the basics (emergency fund, high-interest debt) before committing more to investments.',
  general: (c: AdvisoryContext) => `Your health score is ${c.profile.healthScore}/100. Focus first on whichever of savings, debt or insurance scores lowest.`,
}

/** Deterministic advisor used when no language model is configured or reachable */
export class OfflineAdvisor implements AdvisoryProvider {
  readonly id = 'offline' as const

  async ask(request: AdvisoryRequest): Promise<AdvisoryAnswer> {
    return { text: buildOfflineAnswer(request.question, request.context), provider: 'offline', model: 'rules-v1' }
  }
}

export function buildOfflineAnswer(question: string, context: AdvisoryContext): string {
  const { topic } = buildAdvisorPrompt(question, context)
  const { score, profile } = context
  return `**Financial Health Score: ${profile.healthScore}/100**

**Key Numbers:**
- Risk score: ${score.riskScore.toFixed(2)} (${riskBand(score.riskScore)})
- Investment readiness: ${score.investmentReadiness.toFixed(2)}
- Savings rate: ${profile.monthlyIncome > 0 ? pct(profile.monthlySavings / profile.monthlyIncome) : 'n/a'}
- Insurance gap: ${money(score.insuranceGap)}

${TOPIC_ADVICE[topic](context)}`
}
