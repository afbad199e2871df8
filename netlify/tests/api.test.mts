import { describe, it, expect, beforeEach, vi } from "vitest"
import { z } from "zod"
import { MemoryDocumentStore } from "../../src/engine/persistence.ts"
import { handleAdvisor } from "../functions/advisor.mts"
import { handleAuth } from "../functions/auth.mts"
import { handleCore } from "../functions/core.mts"
import { handleModels } from "../functions/models.mts"
import { handleProfile } from "../functions/profile.mts"
import { loadConfig } from "../functions/_shared/config.mts"
import { signJWT } from "../functions/_shared/jwt.mts"
import { createServices } from "../functions/_shared/services.mts"
import type { ServiceOverrides, Services } from "../functions/_shared/services.mts"

const BASE_ENV = { JWT_SECRET: "test-secret", ADMIN_TOKEN: "test-admin-token", LOG_LEVEL: "error" }

const profile = {
  income: 5000,
  fixedExpenses: 2000,
  variableExpenses: 1000,
  savings: 500,
  insuranceCoverage: 0,
  age: 30,
  dependents: 1,
}

function servicesFor(env: Record<string, string> = {}, overrides: ServiceOverrides = {}): Services {
  return createServices(loadConfig({ ...BASE_ENV, ...env }), {
    storeFactory: () => new MemoryDocumentStore(),
    ...overrides,
  })
}

function request(path: string, init: { method?: string; body?: unknown; token?: string; headers?: Record<string, string> } = {}) {
  const headers: Record<string, string> = { ...init.headers }
  if (init.token) headers.Authorization = `Bearer ${init.token}`
  if (init.body !== undefined) headers["Content-Type"] = "application/json"
  return new Request(`http://localhost${path}`, {
    method: init.method ?? (init.body === undefined ? "GET" : "POST"),
    headers,
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  })
}

const tokensSchema = z.object({
  tokens: z.object({ access_token: z.string(), refresh_token: z.string() }),
})

async function register(services: Services, email = "pat@example.com") {
  const res = await handleAuth(request("/api/auth?action=register", {
    body: { email, password: "test-password" },
  }), services)
  expect(res.status).toBe(201)
  return tokensSchema.parse(await res.json()).tokens
}

describe("auth", () => {
  let services: Services

  beforeEach(() => {
    services = servicesFor()
  })

  it("registers, logs in and identifies the user", async () => {
    await register(services)

    const login = await handleAuth(request("/api/auth?action=login", {
      body: { email: "  PAT@example.com ", password: "test-password" },
    }), services)
    expect(login.status).toBe(200)
    const { access_token } = tokensSchema.parse(await login.json()).tokens

    const me = await handleAuth(request("/api/auth?action=me", { token: access_token }), services)
    const body = await me.json()
    expect(body.user.email).toBe("pat@example.com")
    expect(body.user.password_hash).toBeUndefined()
  })

  it("refuses a duplicate email", async () => {
    await register(services)
    const res = await handleAuth(request("/api/auth?action=register", {
      body: { email: "pat@example.com", password: "test-password" },
    }), services)
    expect(res.status).toBe(409)
  })

  it("refuses a wrong password", async () => {
    await register(services)
    const res = await handleAuth(request("/api/auth?action=login", {
      body: { email: "pat@example.com", password: "wrong-password" },
    }), services)
    expect(res.status).toBe(401)
    expect((await res.json()).code).toBe("INVALID_CREDENTIALS")
  })

  it("names the invalid registration fields", async () => {
    const res = await handleAuth(request("/api/auth?action=register", {
      body: { email: "pat@example.com", password: "short" },
    }), services)
    expect(res.status).toBe(400)
    expect((await res.json()).fields).toEqual(["password"])
  })

  it("issues a new access token for a refresh token, and only then", async () => {
    const { refresh_token, access_token } = await register(services)

    const asBearer = await handleAuth(request("/api/auth?action=me", { token: refresh_token }), services)
    expect(asBearer.status).toBe(401)

    const refreshed = await handleAuth(request("/api/auth?action=refresh", { body: { refresh_token } }), services)
    expect(refreshed.status).toBe(200)

    const withAccess = await handleAuth(request("/api/auth?action=refresh", { body: { refresh_token: access_token } }), services)
    expect(withAccess.status).toBe(401)
  })

  it("stops honouring refresh tokens after logout", async () => {
    const { refresh_token, access_token } = await register(services)

    const logout = await handleAuth(request("/api/auth?action=logout", { method: "POST", token: access_token }), services)
    expect(logout.status).toBe(200)

    const refreshed = await handleAuth(request("/api/auth?action=refresh", { body: { refresh_token } }), services)
    expect(refreshed.status).toBe(401)
    expect((await refreshed.json()).code).toBe("SESSION_ENDED")
  })

  it("refuses a refresh token that names no session", async () => {
    const tokens = await register(services)
    const me = await handleAuth(request("/api/auth?action=me", { token: tokens.access_token }), services)
    const { user } = z.object({ user: z.object({ id: z.string(), email: z.string() }) }).parse(await me.json())

    const sessionless = await signJWT({ sub: user.id, email: user.email, type: "refresh" }, "test-secret", 60)
    const res = await handleAuth(request("/api/auth?action=refresh", { body: { refresh_token: sessionless } }), services)
    expect(res.status).toBe(401)
  })
})

describe("profile", () => {
  let services: Services
  let token: string

  beforeEach(async () => {
    services = servicesFor()
    token = (await register(services)).access_token
  })

  it("requires a token", async () => {
    const res = await handleProfile(request("/api/profile"), services)
    expect(res.status).toBe(401)
  })

  it("starts empty, then returns what was saved", async () => {
    const empty = await handleProfile(request("/api/profile", { token }), services)
    expect(await empty.json()).toEqual({ profile: null })

    const saved = await handleProfile(request("/api/profile", { method: "PUT", token, body: { profile } }), services)
    expect(saved.status).toBe(200)
    const savedBody = await saved.json()
    expect(savedBody.success).toBe(true)
    expect(savedBody.warnings).toEqual([])

    const loaded = await handleProfile(request("/api/profile", { token }), services)
    expect((await loaded.json()).profile).toEqual({ ...profile, period: "monthly", debts: [] })
  })

  it("rejects an invalid profile and keeps the old one", async () => {
    await handleProfile(request("/api/profile", { method: "PUT", token, body: { profile } }), services)

    const res = await handleProfile(request("/api/profile", {
      method: "PUT", token, body: { profile: { ...profile, income: -1, age: 200 } },
    }), services)
    expect(res.status).toBe(400)
    expect((await res.json()).fields).toEqual(["income", "age"])

    const loaded = await handleProfile(request("/api/profile", { token }), services)
    expect((await loaded.json()).profile.income).toBe(5000)
  })

  it("keeps each user's profile private", async () => {
    await handleProfile(request("/api/profile", { method: "PUT", token, body: { profile } }), services)
    const other = (await register(services, "sam@example.com")).access_token

    const res = await handleProfile(request("/api/profile", { token: other }), services)
    expect(await res.json()).toEqual({ profile: null })
  })
})

describe("advisor", () => {
  it("needs a saved profile", async () => {
    const services = servicesFor()
    const token = (await register(services)).access_token

    const res = await handleAdvisor(request("/api/advisor?action=ask", { token, body: { question: "Where do I start?" } }), services)
    expect(res.status).toBe(400)
    expect((await res.json()).fields).toEqual(["profile"])
  })

  it("answers, records and exports the conversation", async () => {
    const services = servicesFor()
    const token = (await register(services)).access_token
    await handleProfile(request("/api/profile", { method: "PUT", token, body: { profile } }), services)

    const ask = await handleAdvisor(request("/api/advisor?action=ask", { token, body: { question: "How much insurance do I need?" } }), services)
    expect(ask.status).toBe(200)
    const { exchange } = await ask.json()
    expect(exchange.provider).toBe("offline")
    expect(exchange.context.score.insuranceGap).toBe(450000)

    const history = await handleAdvisor(request("/api/advisor?action=history", { token }), services)
    expect((await history.json()).exchanges).toHaveLength(1)

    const exported = await handleAdvisor(request("/api/advisor?action=export", { token }), services)
    expect(exported.headers.get("Content-Type")).toBe("text/plain; charset=utf-8")
    const lines = (await exported.text()).split("\n")
    expect(lines[0]).toBe("Financial advisor conversation")
    expect(lines[3]).toBe(`[${exchange.timestamp}] You: How much insurance do I need?`)
  })

  it("saves the question when the language model is down", async () => {
    const fetch = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ error: { message: "unavailable" } }), { status: 503 }))
    const services = servicesFor(
      { GEMINI_API_KEY: "test-key", ADVISOR_MAX_RETRIES: "1" },
      { fetch, sleep: async () => {} },
    )
    const token = (await register(services)).access_token
    await handleProfile(request("/api/profile", { method: "PUT", token, body: { profile } }), services)

    const res = await handleAdvisor(request("/api/advisor?action=ask", { token, body: { question: "Should I invest?" } }), services)
    expect(res.status).toBe(200)
    const body = await res.json()
    expect(body.advisorError.reason).toBe("http")
    expect(body.exchange.answer).toBeNull()
    expect(body.exchange.provider).toBe("unavailable")
    expect(fetch).toHaveBeenCalledTimes(2)

    const history = await handleAdvisor(request("/api/advisor?action=history", { token }), services)
    expect((await history.json()).exchanges).toHaveLength(1)
  })

  it("keeps answering a long conversation that resends its history", async () => {
    const services = servicesFor()
    const token = (await register(services)).access_token
    await handleProfile(request("/api/profile", { method: "PUT", token, body: { profile } }), services)

    const history: { role: "user" | "assistant"; content: string }[] = []
    for (let i = 1; i <= 22; i++) {
      const question = `Question number ${i}?`
      const res = await handleAdvisor(request("/api/advisor?action=ask", { token, body: { question, history } }), services)
      expect(res.status).toBe(200)
      const { exchange } = await res.json()
      history.push({ role: "user", content: question }, { role: "assistant", content: exchange.answer })
    }

    expect(history).toHaveLength(44)
    const saved = await handleAdvisor(request("/api/advisor?action=history", { token }), services)
    expect((await saved.json()).exchanges).toHaveLength(22)
  })

  it("rejects an empty question", async () => {
    const services = servicesFor()
    const token = (await register(services)).access_token
    const res = await handleAdvisor(request("/api/advisor?action=ask", { token, body: { question: "  " } }), services)
    expect(res.status).toBe(400)
    expect((await res.json()).fields).toEqual(["question"])
  })
})

describe("models", () => {
  const trainingSamples = Array.from({ length: 12 }, (_, i) => ({
    features: {
      savingsRate: (i % 5) / 10,
      debtToIncome: (i % 4) / 4,
      coverageRatio: (i % 3) / 2,
      expenseRatio: 0.4 + (i % 6) / 10,
      weightedDebtRate: (i % 7) / 40,
      ageFactor: i / 12,
      dependents: i % 3,
      requiredCoverage: 300000,
    },
    outcome: { riskScore: 0.2 + (i % 4) / 10, investmentReadiness: 0.7 - (i % 5) / 10 },
  }))

  it("serves the baseline until a model is trained", async () => {
    const res = await handleModels(request("/api/models"), servicesFor())
    const body = await res.json()
    expect(body.model.version).toBe(0)
    expect(body.model.kind).toBe("baseline")
    expect(body.versions).toEqual([])
  })

  it("trains and publishes a new version with the admin token", async () => {
    const services = servicesFor()
    const train = await handleModels(request("/api/models?action=train", {
      body: { samples: trainingSamples },
      headers: { "x-admin-token": "test-admin-token" },
    }), services)
    expect(train.status).toBe(201)
    expect((await train.json()).model.version).toBe(1)

    const latest = await handleModels(request("/api/models"), services)
    const body = await latest.json()
    expect(body.model.version).toBe(1)
    expect(body.model.metrics.samples).toBe(12)
    expect(body.versions).toEqual([1])

    const baseline = await handleModels(request("/api/models?action=get&version=0"), services)
    expect((await baseline.json()).model.kind).toBe("baseline")
  })

  it("refuses training without the admin token", async () => {
    const res = await handleModels(request("/api/models?action=train", { body: { samples: trainingSamples } }), servicesFor())
    expect(res.status).toBe(403)
  })

  it("disables training when no admin token is configured", async () => {
    const services = createServices(loadConfig({ JWT_SECRET: "test-secret" }), { storeFactory: () => new MemoryDocumentStore() })
    const res = await handleModels(request("/api/models?action=train", {
      body: { samples: trainingSamples },
      headers: { "x-admin-token": "test-admin-token" },
    }), services)
    expect((await res.json()).code).toBe("TRAINING_DISABLED")
  })

  it("names the sample that cannot be used", async () => {
    const samples = trainingSamples.map((s, i) =>
      i === 3 ? { ...s, features: { ...s.features, ageFactor: null } } : s)
    const res = await handleModels(request("/api/models?action=train", {
      body: { samples },
      headers: { "x-admin-token": "test-admin-token" },
    }), servicesFor())
    expect(res.status).toBe(422)
    const body = await res.json()
    expect(body.code).toBe("TRAINING_ERROR")
    expect(body.sampleIndex).toBe(3)
  })

  it("reports an unknown version", async () => {
    const res = await handleModels(request("/api/models?action=get&version=9"), servicesFor())
    expect(res.status).toBe(404)
  })
})

describe("health", () => {
  it("reports the selected backends", async () => {
    const res = await handleCore(request("/api/health"), servicesFor())
    const body = await res.json()
    expect(body.status).toBe("ok")
    expect(body.storage).toBe("memory")
    expect(body.advisor).toBe("offline")
  })
})
