import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { z } from 'zod'
import {
  AdvisorAPI, APIError, AuthAPI, ProfileAPI, apiRequest, clearAuthData, getStoredTokens, getStoredUser,
  isAuthenticated, storeTokens,
} from './api-client'

type Route = (url: string, init?: RequestInit) => Response | Error

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function fakeToken(expiresInSeconds: number, sub = 'user-1'): string {
  const payload = btoa(JSON.stringify({ sub, exp: Math.floor(Date.now() / 1000) + expiresInSeconds }))
  return `eyJhbGciOiJIUzI1NiJ9.${payload.replace(/=+$/, '')}.signature`
}

function installFetch(...routes: Route[]) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const route = routes.shift()
    if (!route) throw new Error(`unexpected request to ${String(input)}`)
    const result = route(String(input), init)
    if (result instanceof Error) throw result
    return result
  })
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

const noSleep = async () => {}

const user = { id: 'user-1', email: 'pat@example.com', display_name: null, created_at: '2026-01-01T00:00:00.000Z' }

describe('api client', () => {
  beforeEach(() => {
    clearAuthData()
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('stores the session after login and sends the bearer token', async () => {
    const access = fakeToken(3600)
    const fetchMock = installFetch(
      () => jsonResponse({ success: true, user, tokens: { access_token: access, refresh_token: 'refresh-1', expires_in: 3600, token_type: 'Bearer' } }),
      () => jsonResponse({ profile: null }),
    )

    await AuthAPI.login('pat@example.com', 'test-password')
    expect(getStoredTokens()).toEqual({ access, refresh: 'refresh-1' })
    expect(getStoredUser()).toEqual(user)
    expect(isAuthenticated()).toBe(true)

    expect(await ProfileAPI.load()).toBeNull()
    expect(fetchMock.mock.calls[1][0]).toBe('/api/profile')
    expect(new Headers(fetchMock.mock.calls[1][1]?.headers).get('Authorization')).toBe(`Bearer ${access}`)
  })

  it('refreshes an expired access token before the request', async () => {
    storeTokens({ access_token: fakeToken(-60), refresh_token: 'refresh-1' })
    const fresh = fakeToken(3600)
    const fetchMock = installFetch(
      () => jsonResponse({ success: true, access_token: fresh, expires_in: 3600, token_type: 'Bearer' }),
      () => jsonResponse({ profile: null }),
    )

    await ProfileAPI.load()

    expect(fetchMock.mock.calls[0][0]).toBe('/api/auth?action=refresh')
    expect(getStoredTokens().access).toBe(fresh)
  })

  it('signs out when the refresh token is rejected', async () => {
    storeTokens({ access_token: fakeToken(-60), refresh_token: 'refresh-1' })
    installFetch(() => jsonResponse({ error: true, message: 'Invalid or expired refresh token' }, 401))

    const e = await ProfileAPI.load().catch((err: unknown) => err)

    expect(e).toBeInstanceOf(APIError)
    if (e instanceof APIError) expect(e.code).toBe('AUTH_REQUIRED')
    expect(getStoredTokens()).toEqual({ access: null, refresh: null })
  })

  it('retries a GET through a gateway error', async () => {
    storeTokens({ access_token: fakeToken(3600), refresh_token: 'refresh-1' })
    const sleep = vi.fn(noSleep)
    const fetchMock = installFetch(
      () => jsonResponse({ error: true, message: 'busy' }, 503),
      () => jsonResponse({ ok: true }),
    )

    const data = await apiRequest('health', z.object({ ok: z.boolean() }), { sleep })

    expect(data).toEqual({ ok: true })
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(500)
  })

  it('does not repeat a question when the server fails', async () => {
    storeTokens({ access_token: fakeToken(3600), refresh_token: 'refresh-1' })
    const fetchMock = installFetch(() => jsonResponse({ error: true, message: 'The advisor is unavailable right now', code: 'UPSTREAM_ERROR' }, 503))

    const e = await AdvisorAPI.ask('Should I invest?').catch((err: unknown) => err)

    expect(e).toBeInstanceOf(APIError)
    if (e instanceof APIError) {
      expect(e.status).toBe(503)
      expect(e.code).toBe('UPSTREAM_ERROR')
    }
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it('carries the invalid fields of a rejected profile', async () => {
    storeTokens({ access_token: fakeToken(3600), refresh_token: 'refresh-1' })
    installFetch(() => jsonResponse({ error: true, message: 'Profile is invalid', code: 'VALIDATION_ERROR', fields: ['income'] }, 400))

    const e = await apiRequest('profile', z.object({}), { method: 'PUT', body: { profile: {} } }).catch((err: unknown) => err)

    expect(e).toBeInstanceOf(APIError)
    if (e instanceof APIError) {
      expect(e.message).toBe('Profile is invalid')
      expect(e.fields).toEqual(['income'])
    }
  })

  it('reports a network failure after the retries', async () => {
    const fetchMock = installFetch(() => new TypeError('fetch failed'), () => new TypeError('fetch failed'))

    const e = await apiRequest('models?action=latest', z.object({}), { auth: false, retries: 1, sleep: noSleep })
      .catch((err: unknown) => err)

    expect(e).toBeInstanceOf(APIError)
    if (e instanceof APIError) {
      expect(e.status).toBe(0)
      expect(e.code).toBe('NETWORK_ERROR')
    }
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('rejects a response of the wrong shape', async () => {
    installFetch(() => jsonResponse({ unexpected: true }))

    const e = await apiRequest('models?action=latest', z.object({ model: z.object({}) }), { auth: false })
      .catch((err: unknown) => err)

    expect(e).toBeInstanceOf(APIError)
    if (e instanceof APIError) expect(e.code).toBe('BAD_RESPONSE')
  })
})
