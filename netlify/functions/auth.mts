/**
 * Ledgerwise - Auth API (Netlify Serverless Function)
 *
 * Endpoints (via ?action= query param):
 *   POST register - create account
 *   POST login    - authenticate
 *   POST refresh  - exchange a refresh token for an access token
 *   POST logout   - end every session, revoking its refresh tokens
 *   GET  me       - current user
 */

import type { Config } from "@netlify/functions"
import { z } from "zod"
import type { DocumentStore } from "../../src/engine/persistence.ts"
import { signJWT, verifyJWT, hashPassword, verifyPassword } from "./_shared/jwt.mts"
import { error, errorResponse, json, readBody } from "./_shared/http.mts"
import { authenticate, getServices } from "./_shared/services.mts"
import type { Services } from "./_shared/services.mts"

const ACCESS_TTL = 3600 // 1 hour
const REFRESH_TTL = 2592000 // 30 days

// ---- Types ----

const userSchema = z.object({
  id: z.string(),
  email: z.string(),
  display_name: z.string().nullable(),
  password_hash: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
})

type User = z.infer<typeof userSchema>

const emailIndexSchema = z.object({ userId: z.string() })

const sessionSchema = z.object({
  user_id: z.string(),
  created_at: z.string(),
  expires_at: z.string(),
})

const registerSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(8, "Password must be at least 8 characters"),
  display_name: z.string().trim().max(100).optional(),
})

const loginSchema = z.object({
  email: z.string().trim().toLowerCase(),
  password: z.string().min(1),
})

const refreshSchema = z.object({ refresh_token: z.string().min(1) })

// ---- Helpers ----

const userKey = (id: string) => `user:${id}`
const emailKey = (email: string) => `email:${email}`
const sessionPrefix = (userId: string) => `session:${userId}:`
const sessionKey = (userId: string, sid: string) => `${sessionPrefix(userId)}${sid}`

const isExpired = (session: z.infer<typeof sessionSchema>) => Date.parse(session.expires_at) <= Date.now()

async function findUser(users: DocumentStore, id: string): Promise<User | null> {
  return users.getJSON(userKey(id), v => userSchema.parse(v))
}

async function pruneExpiredSessions(users: DocumentStore, userId: string): Promise<void> {
  for (const key of await users.list(sessionPrefix(userId))) {
    const session = await users.getJSON(key, v => sessionSchema.safeParse(v))
    if (!session?.success || isExpired(session.data)) await users.delete(key)
  }
}

async function generateTokens(user: User, services: Services) {
  const secret = services.config.jwtSecret
  const sid = crypto.randomUUID()
  await pruneExpiredSessions(services.users, user.id)
  await services.users.setJSON(sessionKey(user.id, sid), {
    user_id: user.id,
    created_at: new Date().toISOString(),
    expires_at: new Date(Date.now() + REFRESH_TTL * 1000).toISOString(),
  })

  const access_token = await signJWT({ sub: user.id, email: user.email, type: "access" }, secret, ACCESS_TTL)
  const refresh_token = await signJWT({ sub: user.id, email: user.email, type: "refresh", sid }, secret, REFRESH_TTL)

  return { access_token, refresh_token, expires_in: ACCESS_TTL, token_type: "Bearer" }
}

function sanitizeUser(user: User) {
  return {
    id: user.id,
    email: user.email,
    display_name: user.display_name,
    created_at: user.created_at,
  }
}

// ---- Route Handlers ----

async function handleRegister(req: Request, services: Services): Promise<Response> {
  const { email, password, display_name } = await readBody(req, registerSchema)

  const existing = await services.users.getJSON(emailKey(email), v => emailIndexSchema.parse(v))
  if (existing) {
    return error("An account with this email already exists", 409, "EMAIL_EXISTS")
  }

  const now = new Date().toISOString()
  const user: User = {
    id: crypto.randomUUID(),
    email,
    display_name: display_name || null,
    password_hash: await hashPassword(password),
    created_at: now,
    updated_at: now,
  }

  await services.users.setJSON(userKey(user.id), user)
  await services.users.setJSON(emailKey(email), { userId: user.id })

  const tokens = await generateTokens(user, services)
  return json({ success: true, user: sanitizeUser(user), tokens }, 201)
}

async function handleLogin(req: Request, services: Services): Promise<Response> {
  const { email, password } = await readBody(req, loginSchema)
  const invalid = () => error("Invalid email or password", 401, "INVALID_CREDENTIALS")

  const index = await services.users.getJSON(emailKey(email), v => emailIndexSchema.parse(v))
  if (!index) return invalid()

  const user = await findUser(services.users, index.userId)
  if (!user || !(await verifyPassword(password, user.password_hash))) return invalid()

  const tokens = await generateTokens(user, services)
  return json({ success: true, user: sanitizeUser(user), tokens })
}

async function handleRefresh(req: Request, services: Services): Promise<Response> {
  const { refresh_token } = await readBody(req, refreshSchema)

  const payload = await verifyJWT(refresh_token, services.config.jwtSecret)
  if (!payload || payload.type !== "refresh" || !payload.sid) {
    return error("Invalid or expired refresh token", 401, "TOKEN_EXPIRED")
  }

  // Logout deletes the session, which revokes every token issued for it
  const session = await services.users.getJSON(sessionKey(payload.sub, payload.sid), v => sessionSchema.safeParse(v))
  if (!session?.success || session.data.user_id !== payload.sub || isExpired(session.data)) {
    return error("Session has ended", 401, "SESSION_ENDED")
  }

  const user = await findUser(services.users, payload.sub)
  if (!user) return error("User not found", 401)

  const access_token = await signJWT({ sub: user.id, email: user.email, type: "access" }, services.config.jwtSecret, ACCESS_TTL)
  return json({ success: true, access_token, expires_in: ACCESS_TTL, token_type: "Bearer" })
}

async function handleLogout(req: Request, services: Services): Promise<Response> {
  const ctx = await authenticate(req, services, "Auth")
  // Logout is always "successful"
  if (!ctx) return json({ success: true })

  const keys = await services.users.list(sessionPrefix(ctx.userId))
  for (const key of keys) await services.users.delete(key)
  return json({ success: true })
}

async function handleMe(req: Request, services: Services): Promise<Response> {
  const ctx = await authenticate(req, services, "Auth")
  if (!ctx) return error("Not authenticated", 401, "AUTH_REQUIRED")

  const user = await findUser(services.users, ctx.userId)
  if (!user) return error("User not found", 404)
  return json({ user: sanitizeUser(user) })
}

// ---- Main Handler ----

export async function handleAuth(req: Request, services: Services): Promise<Response> {
  const action = new URL(req.url).searchParams.get("action") || ""

  if (req.method === "OPTIONS") {
    return new Response(null, { status: 204 })
  }

  try {
    switch (action) {
      case "register":
        return await handleRegister(req, services)
      case "login":
        return await handleLogin(req, services)
      case "refresh":
        return await handleRefresh(req, services)
      case "logout":
        return await handleLogout(req, services)
      case "me":
        return await handleMe(req, services)
      default:
        return error(`Unknown action: ${action}`, 400)
    }
  } catch (e) {
    return errorResponse(e, services.logger("Auth"))
  }
}

export default async (req: Request) => handleAuth(req, getServices())

export const config: Config = {
  path: "/api/auth",
}
