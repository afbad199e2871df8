/**
 * Ledgerwise - Persistence Bridge
 *
 * A minimal document-store interface with an in-memory implementation,
 * and the per-user repository for profiles and advisory history.
 * The Netlify Blobs implementation lives with the functions.
 */

import { z } from 'zod'
import { ValidationError } from './errors'
import { silentLogger } from './logger'
import type { Logger } from './logger'
import { withTimeout } from './resilience'
import { financialProfileSchema, parseProfile } from './validation'
import type { AdvisoryExchange, FinancialProfile } from './types'

// ─── Document Store ───────────────────────────────────────────────────────

/** Parses a stored value into its typed form; throws on mismatch */
export type Parser<T> = (value: unknown) => T

export interface DocumentStore {
  getJSON<T>(key: string, parse: Parser<T>): Promise<T | null>
  setJSON(key: string, value: unknown): Promise<void>
  /** Write only if `key` is absent; false when it already exists */
  createJSON(key: string, value: unknown): Promise<boolean>
  /** Keys that start with `prefix`, sorted */
  list(prefix: string): Promise<string[]>
  delete(key: string): Promise<void>
}

/** In-process store. Values are held as JSON text so reads never alias writes. */
export class MemoryDocumentStore implements DocumentStore {
  private data = new Map<string, string>()

  async getJSON<T>(key: string, parse: Parser<T>): Promise<T | null> {
    const raw = this.data.get(key)
    if (raw === undefined) return null
    return parse(JSON.parse(raw))
  }

  async setJSON(key: string, value: unknown): Promise<void> {
    this.data.set(key, JSON.stringify(value))
  }

  async createJSON(key: string, value: unknown): Promise<boolean> {
    if (this.data.has(key)) return false
    this.data.set(key, JSON.stringify(value))
    return true
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.data.keys()].filter(k => k.startsWith(prefix)).sort()
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key)
  }

  get size(): number {
    return this.data.size
  }
}

/** Bound every call on `store` by `timeoutMs` */
export function withStoreTimeout(store: DocumentStore, timeoutMs: number): DocumentStore {
  return {
    getJSON: (key, parse) => withTimeout(store.getJSON(key, parse), timeoutMs, 'store', `read ${key}`),
    setJSON: (key, value) => withTimeout(store.setJSON(key, value), timeoutMs, 'store', `write ${key}`),
    createJSON: (key, value) => withTimeout(store.createJSON(key, value), timeoutMs, 'store', `create ${key}`),
    list: prefix => withTimeout(store.list(prefix), timeoutMs, 'store', `list ${prefix}`),
    delete: key => withTimeout(store.delete(key), timeoutMs, 'store', `delete ${key}`),
  }
}

// ─── Record Schemas ───────────────────────────────────────────────────────

const profileRecordSchema = z.object({
  userId: z.string(),
  profile: z.unknown(),
  updatedAt: z.string(),
})

const scoreSchema = z.object({
  riskScore: z.number(),
  investmentReadiness: z.number(),
  insuranceGap: z.number(),
  modelVersion: z.number().int(),
})

export const advisoryExchangeSchema = z.object({
  id: z.string().min(1),
  question: z.string(),
  context: z.object({
    profile: z.object({
      monthlyIncome: z.number(),
      monthlyExpenses: z.number(),
      monthlySavings: z.number(),
      monthlySurplus: z.number(),
      totalDebt: z.number(),
      insuranceCoverage: z.number(),
      emergencyFund: z.number(),
      investments: z.number(),
      age: z.number(),
      dependents: z.number(),
      healthScore: z.number(),
      goals: z.string().optional(),
    }),
    score: scoreSchema,
  }),
  answer: z.string().nullable(),
  provider: z.enum(['gemini', 'offline', 'unavailable']),
  timestamp: z.string(),
})

// ─── Keys ─────────────────────────────────────────────────────────────────

const USER_ID = /^[A-Za-z0-9_-]{1,128}$/

function assertUserId(userId: string): void {
  if (!USER_ID.test(userId)) throw new ValidationError('Invalid user id', ['userId'])
}

export const profileKey = (userId: string) => `profile:${userId}`
export const exchangePrefix = (userId: string) => `exchange:${userId}:`

/** Sortable key: zero-padded epoch millis, then the exchange id */
export function exchangeKey(userId: string, exchange: Pick<AdvisoryExchange, 'id' | 'timestamp'>): string {
  const ms = Date.parse(exchange.timestamp)
  const stamp = String(Number.isFinite(ms) ? ms : 0).padStart(15, '0')
  return `${exchangePrefix(userId)}${stamp}-${exchange.id}`
}

// ─── Repository ───────────────────────────────────────────────────────────

export const DEFAULT_HISTORY_LIMIT = 40

export interface ProfileRepositoryOptions {
  log?: Logger
  now?: () => Date
}

export class ProfileRepository {
  private log: Logger
  private now: () => Date

  constructor(private store: DocumentStore, options: ProfileRepositoryOptions = {}) {
    this.log = options.log ?? silentLogger
    this.now = options.now ?? (() => new Date())
  }

  /** Reads `key`, treating text that is not JSON like a missing record */
  private async readRecord<T>(key: string, parse: Parser<T>): Promise<T | null> {
    try {
      return await this.store.getJSON(key, parse)
    } catch (e) {
      if (!(e instanceof SyntaxError)) throw e
      this.log.warn(`${key} is not valid JSON: ${e.message}`)
      return null
    }
  }

  /** The stored profile, or null when none exists or the record is unreadable */
  async getProfile(userId: string): Promise<FinancialProfile | null> {
    assertUserId(userId)
    const record = await this.readRecord(profileKey(userId), v => profileRecordSchema.safeParse(v))
    if (!record) return null

    const result = record.success
      ? financialProfileSchema.safeParse(record.data.profile)
      : record
    if (!result.success) {
      this.log.warn(`discarding invalid stored profile for ${userId}`, result.error.issues.length, 'issue(s)')
      return null
    }
    return result.data
  }

  async putProfile(userId: string, profile: unknown): Promise<FinancialProfile> {
    assertUserId(userId)
    const valid = parseProfile(profile)
    await this.store.setJSON(profileKey(userId), {
      userId,
      profile: valid,
      updatedAt: this.now().toISOString(),
    })
    this.log.info(`saved profile for ${userId}`)
    return valid
  }

  /** Append-only: an existing key is never overwritten */
  async appendExchange(userId: string, exchange: AdvisoryExchange): Promise<void> {
    assertUserId(userId)
    const key = exchangeKey(userId, exchange)
    const created = await this.store.createJSON(key, advisoryExchangeSchema.parse(exchange))
    if (!created) {
      throw new ValidationError(`Exchange ${exchange.id} already recorded`, ['id'])
    }
  }

  /** Oldest first, keeping the newest `limit` */
  async listExchanges(userId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<AdvisoryExchange[]> {
    assertUserId(userId)
    if (limit <= 0) return []
    const keys = (await this.store.list(exchangePrefix(userId))).slice(-limit)
    const exchanges: AdvisoryExchange[] = []
    for (const key of keys) {
      const parsed = await this.readRecord(key, v => advisoryExchangeSchema.safeParse(v))
      if (parsed?.success) exchanges.push(parsed.data)
      else this.log.warn(`skipping unreadable exchange ${key}`)
    }
    return exchanges
  }
}
