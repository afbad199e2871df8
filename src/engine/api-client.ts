/**
 * Ledgerwise - API Client
 *
 * HTTP wrapper for the Netlify functions with automatic token refresh,
 * bounded retries and error normalization. Every response is checked
 * against a schema before it reaches the UI.
 */

import { z } from 'zod'
import { modelArtifactSchema } from './model-registry'
import { advisoryExchangeSchema } from './persistence'
import { withRetry } from './resilience'
import type { Sleep } from './resilience'
import type { ChatTurn } from './ai-context'
import { financialProfileSchema } from './validation'
import type { FinancialProfile } from './types'

// ============================================
//  CONFIGURATION
// ============================================

const DEFAULT_TIMEOUT_MS = 20_000
/** The advisor may retry upstream before answering */
const ADVISOR_TIMEOUT_MS = 60_000
const RETRY_BASE_MS = 500

export function getAPIBaseUrl(): string {
  const configured = import.meta.env.VITE_API_BASE
  return (typeof configured === 'string' && configured ? configured : '/api').replace(/\/$/, '')
}

// ============================================
//  TOKEN MANAGEMENT
// ============================================

const TOKEN_KEYS = {
  ACCESS: 'ledgerwise:access-token',
  REFRESH: 'ledgerwise:refresh-token',
  USER: 'ledgerwise:user',
} as const

type KeyValueStore = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>

/** Used where there is no localStorage (tests, private mode failures) */
function memoryStorage(): KeyValueStore {
  const data = new Map<string, string>()
  return {
    getItem: key => data.get(key) ?? null,
    setItem: (key, value) => { data.set(key, value) },
    removeItem: key => { data.delete(key) },
  }
}

const fallbackStorage = memoryStorage()

function storage(): KeyValueStore {
  return typeof localStorage === 'undefined' ? fallbackStorage : localStorage
}

const authUserSchema = z.object({
  id: z.string(),
  email: z.string(),
  display_name: z.string().nullable(),
  created_at: z.string(),
})

export type AuthUser = z.infer<typeof authUserSchema>

const authTokensSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  expires_in: z.number(),
  token_type: z.string(),
})

export type AuthTokens = z.infer<typeof authTokensSchema>

export function getStoredTokens(): { access: string | null; refresh: string | null } {
  return {
    access: storage().getItem(TOKEN_KEYS.ACCESS),
    refresh: storage().getItem(TOKEN_KEYS.REFRESH),
  }
}

export function storeTokens(tokens: Pick<AuthTokens, 'access_token'> & Partial<AuthTokens>): void {
  storage().setItem(TOKEN_KEYS.ACCESS, tokens.access_token)
  if (tokens.refresh_token) storage().setItem(TOKEN_KEYS.REFRESH, tokens.refresh_token)
}

export function storeUser(user: AuthUser): void {
  storage().setItem(TOKEN_KEYS.USER, JSON.stringify(user))
}

export function getStoredUser(): AuthUser | null {
  const raw = storage().getItem(TOKEN_KEYS.USER)
  if (!raw) return null
  try {
    const parsed = authUserSchema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data : null
  } catch {
    // Corrupt entry; treat as signed out
    return null
  }
}

export function clearAuthData(): void {
  storage().removeItem(TOKEN_KEYS.ACCESS)
  storage().removeItem(TOKEN_KEYS.REFRESH)
  storage().removeItem(TOKEN_KEYS.USER)
}

const tokenClaimsSchema = z.object({ exp: z.number() })

/** Expiry in epoch millis, read without verifying the signature */
function tokenExpiry(token: string): number | null {
  const part = token.split('.')[1]
  if (!part) return null
  try {
    const claims = tokenClaimsSchema.safeParse(JSON.parse(atob(part.replace(/-/g, '+').replace(/_/g, '/'))))
    return claims.success ? claims.data.exp * 1000 : null
  } catch {
    return null
  }
}

// ============================================
//  API ERROR CLASS
// ============================================

export class APIError extends Error {
  constructor(
    message: string,
    public status: number,
    public code?: string,
    public fields: string[] = [],
  ) {
    super(message)
    this.name = 'APIError'
  }

  /** Network failures and gateway errors are worth another attempt */
  get retryable(): boolean {
    return this.status === 0 || this.status === 502 || this.status === 503 || this.status === 504
  }
}

const errorBodySchema = z.object({
  message: z.string().optional(),
  code: z.string().optional(),
  fields: z.array(z.string()).optional(),
})

// ============================================
//  CORE HTTP METHODS
// ============================================

let pendingRefresh: Promise<string | null> | null = null

async function requestNewAccessToken(): Promise<string | null> {
  const { refresh } = getStoredTokens()
  if (!refresh) return null

  const res = await fetch(`${getAPIBaseUrl()}/auth?action=refresh`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ refresh_token: refresh }),
    signal: AbortSignal.timeout(DEFAULT_TIMEOUT_MS),
  }).catch(() => null)
  if (!res) return null

  const parsed = z.object({ access_token: z.string() }).safeParse(await res.json().catch(() => null))
  if (!res.ok || !parsed.success) {
    clearAuthData()
    return null
  }
  storeTokens(parsed.data)
  return parsed.data.access_token
}

/** One refresh at a time; concurrent callers share it */
function refreshAccessToken(): Promise<string | null> {
  if (!pendingRefresh) {
    pendingRefresh = requestNewAccessToken().finally(() => { pendingRefresh = null })
  }
  return pendingRefresh
}

async function getValidAccessToken(): Promise<string | null> {
  const { access } = getStoredTokens()
  if (!access) return null
  const expiresAt = tokenExpiry(access)
  // Refresh a minute before expiry
  if (expiresAt !== null && Date.now() < expiresAt - 60_000) return access
  return refreshAccessToken()
}

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT'
  body?: unknown
  auth?: boolean
  retries?: number
  timeoutMs?: number
  sleep?: Sleep
}

async function send(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) })
  } catch (e) {
    if (e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError')) {
      throw new APIError('The server took too long to respond', 0, 'TIMEOUT')
    }
    throw new APIError('Network error - check your connection', 0, 'NETWORK_ERROR')
  }
}

async function toAPIError(res: Response): Promise<APIError> {
  const parsed = errorBodySchema.safeParse(await res.json().catch(() => null))
  const body = parsed.success ? parsed.data : {}
  return new APIError(body.message ?? `Request failed (${res.status})`, res.status, body.code, body.fields)
}

async function attempt(endpoint: string, options: RequestOptions): Promise<Response> {
  const { method = 'GET', body, auth = true, timeoutMs = DEFAULT_TIMEOUT_MS } = options
  const url = `${getAPIBaseUrl()}/${endpoint}`
  const headers: Record<string, string> = { 'Content-Type': 'application/json' }

  if (auth) {
    const token = await getValidAccessToken()
    if (!token) throw new APIError('Not authenticated', 401, 'AUTH_REQUIRED')
    headers.Authorization = `Bearer ${token}`
  }

  const init: RequestInit = { method, headers }
  if (body !== undefined && method !== 'GET') init.body = JSON.stringify(body)

  let res = await send(url, init, timeoutMs)

  // An access token can expire between the check and the server; refresh once
  if (res.status === 401 && auth) {
    const fresh = await refreshAccessToken()
    if (!fresh) throw new APIError('Session expired. Please log in again.', 401, 'TOKEN_EXPIRED')
    headers.Authorization = `Bearer ${fresh}`
    res = await send(url, init, timeoutMs)
  }

  if (!res.ok) throw await toAPIError(res)
  return res
}

async function apiResponse(endpoint: string, options: RequestOptions = {}): Promise<Response> {
  // Only idempotent requests are retried
  const retries = options.retries ?? (options.method === undefined || options.method === 'GET' ? 2 : 0)
  return withRetry(
    () => attempt(endpoint, options),
    { retries, baseDelayMs: RETRY_BASE_MS, sleep: options.sleep },
    e => e instanceof APIError && e.retryable,
  )
}

export async function apiRequest<T>(
  endpoint: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestOptions = {},
): Promise<T> {
  const res = await apiResponse(endpoint, options)
  const parsed = schema.safeParse(await res.json().catch(() => null))
  if (!parsed.success) {
    throw new APIError('The server sent an unexpected response', res.status, 'BAD_RESPONSE')
  }
  return parsed.data
}

// ============================================
//  AUTH API
// ============================================

const authResponseSchema = z.object({
  success: z.boolean(),
  user: authUserSchema,
  tokens: authTokensSchema,
})

export const AuthAPI = {
  async register(email: string, password: string, displayName?: string) {
    const data = await apiRequest('auth?action=register', authResponseSchema, {
      method: 'POST',
      body: { email, password, display_name: displayName || undefined },
      auth: false,
    })
    storeTokens(data.tokens)
    storeUser(data.user)
    return data
  },

  async login(email: string, password: string) {
    const data = await apiRequest('auth?action=login', authResponseSchema, {
      method: 'POST',
      body: { email, password },
      auth: false,
    })
    storeTokens(data.tokens)
    storeUser(data.user)
    return data
  },

  async logout(): Promise<void> {
    try {
      await apiRequest('auth?action=logout', z.object({ success: z.boolean() }), { method: 'POST', body: {} })
    } catch (e) {
      // Local sign-out still happens
      console.warn('[Auth] logout request failed', e instanceof Error ? e.message : e)
    }
    clearAuthData()
  },

  async me() {
    return apiRequest('auth?action=me', z.object({ user: authUserSchema }))
  },
}

// ============================================
//  PROFILE API
// ============================================

const fieldIssueSchema = z.object({ path: z.string(), message: z.string() })

export const ProfileAPI = {
  async load(): Promise<FinancialProfile | null> {
    const data = await apiRequest('profile', z.object({ profile: financialProfileSchema.nullable() }))
    return data.profile
  },

  async save(profile: FinancialProfile) {
    return apiRequest('profile', z.object({
      success: z.boolean(),
      profile: financialProfileSchema,
      warnings: z.array(fieldIssueSchema),
    }), { method: 'PUT', body: { profile } })
  },
}

// ============================================
//  ADVISOR API
// ============================================

const askResponseSchema = z.object({
  exchange: advisoryExchangeSchema,
  advisorError: z.object({ reason: z.string(), message: z.string() }).optional(),
})

export type AskResponse = z.infer<typeof askResponseSchema>

export const AdvisorAPI = {
  async ask(question: string, history: ChatTurn[] = []): Promise<AskResponse> {
    return apiRequest('advisor?action=ask', askResponseSchema, {
      method: 'POST',
      body: { question, history },
      timeoutMs: ADVISOR_TIMEOUT_MS,
    })
  },

  async history(limit?: number) {
    const query = limit ? `&limit=${limit}` : ''
    const data = await apiRequest(`advisor?action=history${query}`, z.object({ exchanges: z.array(advisoryExchangeSchema) }))
    return data.exchanges
  },

  async exportTranscript(): Promise<string> {
    const res = await apiResponse('advisor?action=export')
    return res.text()
  },
}

// ============================================
//  MODELS API
// ============================================

export const ModelsAPI = {
  async latest() {
    return apiRequest('models?action=latest', z.object({
      model: modelArtifactSchema,
      versions: z.array(z.number()),
    }), { auth: false })
  },
}

// ============================================
//  CHECK AUTH STATE
// ============================================

export function isAuthenticated(): boolean {
  const { access } = getStoredTokens()
  if (!access) return false
  const expiresAt = tokenExpiry(access)
  return expiresAt !== null && expiresAt > Date.now()
}

export function hasRefreshToken(): boolean {
  return !!getStoredTokens().refresh
}
