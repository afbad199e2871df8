import { describe, it, expect, beforeEach, vi } from 'vitest'
import { AdvisoryService, exportTranscript } from './advisory-service'
import { OfflineAdvisor } from './ai-providers'
import type { AdvisoryAnswer, AdvisoryProvider, AdvisoryRequest } from './ai-providers'
import { UpstreamError, ValidationError } from './errors'
import { ModelRegistry } from './model-registry'
import { MemoryDocumentStore, ProfileRepository } from './persistence'
import { FEATURE_NAMES } from './types'
import type { AdvisoryExchange } from './types'
import { starterProfile } from './__fixtures__/profiles'

const NOW = new Date('2026-04-01T09:30:00.000Z')

function failingAdvisor(error: Error) {
  return {
    id: 'gemini' as const,
    ask: vi.fn(async (_request: AdvisoryRequest): Promise<AdvisoryAnswer> => { throw error }),
  }
}

describe('AdvisoryService', () => {
  let profiles: ProfileRepository
  let models: ModelRegistry
  let ids: number

  const service = (advisor: AdvisoryProvider) => new AdvisoryService({
    profiles, models, advisor, now: () => NOW, newId: () => `ex-${++ids}`,
  })

  beforeEach(async () => {
    profiles = new ProfileRepository(new MemoryDocumentStore())
    models = new ModelRegistry(new MemoryDocumentStore())
    ids = 0
    await profiles.putProfile('user-1', starterProfile)
  })

  it('answers and records the exchange', async () => {
    const { exchange, error } = await service(new OfflineAdvisor()).ask('user-1', '  Should I invest?  ')

    expect(error).toBeUndefined()
    expect(exchange.id).toBe('ex-1')
    expect(exchange.question).toBe('Should I invest?')
    expect(exchange.provider).toBe('offline')
    expect(exchange.answer).toContain('**Financial Health Score: 58/100**')
    expect(exchange.timestamp).toBe('2026-04-01T09:30:00.000Z')
    expect(await profiles.listExchanges('user-1')).toEqual([exchange])
  })

  it('records the exchange when the advisor is unavailable', async () => {
    const advisor = failingAdvisor(new UpstreamError('Quota exceeded', 'advisor', 'quota', 429))

    const { exchange, error } = await service(advisor).ask('user-1', 'Can I retire early?')

    expect(error?.reason).toBe('quota')
    expect(exchange.answer).toBeNull()
    expect(exchange.provider).toBe('unavailable')
    expect(await profiles.listExchanges('user-1')).toEqual([exchange])
  })

  it('propagates unexpected advisor failures without recording', async () => {
    const advisor = failingAdvisor(new Error('bug'))

    await expect(service(advisor).ask('user-1', 'Hello')).rejects.toThrow('bug')
    expect(await profiles.listExchanges('user-1')).toEqual([])
  })

  it('sends the advisor the same context it records', async () => {
    const advisor = new OfflineAdvisor()
    const ask = vi.spyOn(advisor, 'ask')
    const history = [{ role: 'user' as const, content: 'Earlier question' }]

    const { exchange } = await service(advisor).ask('user-1', 'What next?', history)

    expect(ask).toHaveBeenCalledWith({ question: 'What next?', context: exchange.context, history })
    expect(exchange.context.score.insuranceGap).toBe(450000)
  })

  it('scores with the latest published model', async () => {
    await models.publish({
      kind: 'trained',
      features: FEATURE_NAMES,
      risk: { intercept: 0.9, weights: [0, 0, 0, 0, 0, 0, 0] },
      readiness: { intercept: 0.2, weights: [0, 0, 0, 0, 0, 0, 0] },
    })

    const { exchange } = await service(new OfflineAdvisor()).ask('user-1', 'How am I doing?')

    expect(exchange.context.score.modelVersion).toBe(1)
    expect(exchange.context.score.riskScore).toBeCloseTo(0.9, 10)
  })

  it('rejects an empty question before calling the advisor', async () => {
    const advisor = failingAdvisor(new Error('should not be called'))
    const err = await service(advisor).ask('user-1', '   ').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ValidationError)
    if (err instanceof ValidationError) expect(err.fields).toEqual(['question'])
    expect(advisor.ask).not.toHaveBeenCalled()
  })

  it('requires a saved profile', async () => {
    const err = await service(new OfflineAdvisor()).ask('user-2', 'Hello').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ValidationError)
    if (err instanceof ValidationError) expect(err.fields).toEqual(['profile'])
  })
})

describe('exportTranscript', () => {
  const base: Omit<AdvisoryExchange, 'id' | 'question' | 'answer' | 'provider'> = {
    context: {
      profile: {
        monthlyIncome: 5000, monthlyExpenses: 3000, monthlySavings: 500, monthlySurplus: 1500,
        totalDebt: 0, insuranceCoverage: 0, emergencyFund: 0, investments: 0,
        age: 30, dependents: 1, healthScore: 58,
      },
      score: { riskScore: 0.38, investmentReadiness: 0.47, insuranceGap: 450000, modelVersion: 0 },
    },
    timestamp: '2026-04-01T09:30:00.000Z',
  }

  it('renders questions and answers in order', () => {
    const text = exportTranscript([
      { ...base, id: 'a', question: 'Should I invest?', answer: 'Build a reserve first.', provider: 'offline' },
      { ...base, id: 'b', question: 'And insurance?', answer: null, provider: 'unavailable' },
    ], new Date('2026-04-02T00:00:00.000Z'))

    expect(text).toBe([
      'Financial advisor conversation',
      'Exported: 2026-04-02T00:00:00.000Z',
      '',
      '[2026-04-01T09:30:00.000Z] You: Should I invest?',
      '[2026-04-01T09:30:00.000Z] Advisor: Build a reserve first.',
      '',
      '[2026-04-01T09:30:00.000Z] You: And insurance?',
      '[2026-04-01T09:30:00.000Z] Advisor: (advice unavailable)',
      '',
    ].join('\n'))
  })
})
