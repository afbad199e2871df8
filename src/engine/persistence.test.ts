import { describe, it, expect, beforeEach, vi } from 'vitest'
import { UpstreamError, ValidationError } from './errors'
import { MemoryDocumentStore, ProfileRepository, exchangeKey, profileKey, withStoreTimeout } from './persistence'
import type { DocumentStore } from './persistence'
import type { AdvisoryExchange, FinancialProfile } from './types'

const profile: FinancialProfile = {
  income: 5000,
  period: 'monthly',
  fixedExpenses: 2000,
  variableExpenses: 1000,
  savings: 500,
  debts: [{ label: 'Student loan', amount: 12000, rate: 0.045 }],
  insuranceCoverage: 100000,
  age: 30,
  dependents: 1,
  emergencyFund: 6000,
}

function exchange(id: string, timestamp: string): AdvisoryExchange {
  return {
    id,
    question: `Question ${id}`,
    context: {
      profile: {
        monthlyIncome: 5000, monthlyExpenses: 3000, monthlySavings: 500, monthlySurplus: 1500,
        totalDebt: 12000, insuranceCoverage: 100000, emergencyFund: 6000, investments: 0,
        age: 30, dependents: 1, healthScore: 62,
      },
      score: { riskScore: 0.4, investmentReadiness: 0.5, insuranceGap: 350000, modelVersion: 0 },
    },
    answer: `Answer ${id}`,
    provider: 'offline',
    timestamp,
  }
}

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('persistence: profiles', () => {
  let store: MemoryDocumentStore
  let repo: ProfileRepository

  beforeEach(() => {
    store = new MemoryDocumentStore()
    repo = new ProfileRepository(store, { now: () => new Date('2026-02-01T00:00:00.000Z') })
  })

  it('round-trips a profile', async () => {
    await repo.putProfile('user-1', profile)
    expect(await repo.getProfile('user-1')).toEqual(profile)
  })

  it('returns null when no profile exists', async () => {
    expect(await repo.getProfile('nobody')).toBeNull()
  })

  it('keeps users apart', async () => {
    await repo.putProfile('user-1', profile)
    await repo.putProfile('user-2', { ...profile, income: 9000 })
    expect((await repo.getProfile('user-1'))?.income).toBe(5000)
    expect((await repo.getProfile('user-2'))?.income).toBe(9000)
  })

  it('stores a timestamped record keyed by user', async () => {
    await repo.putProfile('user-1', profile)
    const record = await store.getJSON(profileKey('user-1'), v => v)
    expect(record).toEqual({ userId: 'user-1', profile, updatedAt: '2026-02-01T00:00:00.000Z' })
  })

  it('rejects an invalid profile without touching the stored one', async () => {
    await repo.putProfile('user-1', profile)
    await expect(repo.putProfile('user-1', { ...profile, income: 0 })).rejects.toBeInstanceOf(ValidationError)
    expect(await repo.getProfile('user-1')).toEqual(profile)
  })

  it('discards an unreadable stored record with a warning', async () => {
    const log = spyLogger()
    const quiet = new ProfileRepository(store, { log })
    await store.setJSON(profileKey('user-1'), { userId: 'user-1', profile: { income: 'lots' }, updatedAt: 'x' })
    expect(await quiet.getProfile('user-1')).toBeNull()
    expect(log.warn).toHaveBeenCalledTimes(1)
  })

  it('rejects user ids that could escape their key prefix', async () => {
    await expect(repo.getProfile('a:b')).rejects.toBeInstanceOf(ValidationError)
  })

  it('hands out copies, not stored references', async () => {
    await repo.putProfile('user-1', profile)
    const first = await repo.getProfile('user-1')
    first?.debts.push({ amount: 1, rate: 0 })
    expect((await repo.getProfile('user-1'))?.debts).toHaveLength(1)
  })
})

describe('persistence: advisory history', () => {
  let repo: ProfileRepository

  beforeEach(() => {
    repo = new ProfileRepository(new MemoryDocumentStore())
  })

  it('lists exchanges oldest first', async () => {
    await repo.appendExchange('user-1', exchange('b', '2026-03-02T00:00:00.000Z'))
    await repo.appendExchange('user-1', exchange('a', '2026-03-01T00:00:00.000Z'))
    const list = await repo.listExchanges('user-1')
    expect(list.map(x => x.id)).toEqual(['a', 'b'])
  })

  it('keeps the newest entries when limited', async () => {
    for (let day = 1; day <= 5; day++) {
      await repo.appendExchange('user-1', exchange(`x${day}`, `2026-03-0${day}T00:00:00.000Z`))
    }
    const list = await repo.listExchanges('user-1', 2)
    expect(list.map(x => x.id)).toEqual(['x4', 'x5'])
  })

  it('never overwrites a recorded exchange', async () => {
    await repo.appendExchange('user-1', exchange('a', '2026-03-01T00:00:00.000Z'))
    await expect(repo.appendExchange('user-1', exchange('a', '2026-03-01T00:00:00.000Z')))
      .rejects.toBeInstanceOf(ValidationError)
  })

  it('records unavailable answers', async () => {
    await repo.appendExchange('user-1', { ...exchange('a', '2026-03-01T00:00:00.000Z'), answer: null, provider: 'unavailable' })
    const [saved] = await repo.listExchanges('user-1')
    expect(saved.answer).toBeNull()
    expect(saved.provider).toBe('unavailable')
  })

  it('returns nothing for a zero or negative limit', async () => {
    await repo.appendExchange('user-1', exchange('a', '2026-03-01T00:00:00.000Z'))
    expect(await repo.listExchanges('user-1', 0)).toEqual([])
    expect(await repo.listExchanges('user-1', -3)).toEqual([])
  })

  it('builds sortable exchange keys', () => {
    expect(exchangeKey('user-1', { id: 'abc', timestamp: '1970-01-01T00:00:01.000Z' }))
      .toBe('exchange:user-1:000000000001000-abc')
  })
})

describe('persistence: timeouts', () => {
  const hanging: DocumentStore = {
    getJSON: () => new Promise(() => {}),
    setJSON: () => new Promise(() => {}),
    createJSON: () => new Promise(() => {}),
    list: () => new Promise(() => {}),
    delete: () => new Promise(() => {}),
  }

  it('fails a stalled read with an upstream timeout', async () => {
    const store = withStoreTimeout(hanging, 10)
    const err = await store.getJSON('profile:user-1', v => v).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(UpstreamError)
    if (err instanceof UpstreamError) {
      expect(err.service).toBe('store')
      expect(err.reason).toBe('timeout')
    }
  })

  it('passes through calls that finish in time', async () => {
    const inner = new MemoryDocumentStore()
    const store = withStoreTimeout(inner, 1000)
    await store.setJSON('k', { a: 1 })
    expect(await store.getJSON('k', v => v)).toEqual({ a: 1 })
    expect(await store.list('k')).toEqual(['k'])
  })

  it('bounds conditional writes too', async () => {
    const err = await withStoreTimeout(hanging, 10).createJSON('model:000001', {}).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(UpstreamError)
  })
})
