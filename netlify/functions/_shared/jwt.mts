/**
 * Ledgerwise - JWT Utilities (Web Crypto API)
 * Lightweight JWT sign/verify using HMAC-SHA256, PBKDF2 password hashing
 */

import { z } from "zod"

const encoder = new TextEncoder()

const ISSUER = "ledgerwise"
const PBKDF2_ITERATIONS = 100000

function base64UrlEncode(data: Uint8Array): string {
  const base64 = btoa(String.fromCharCode(...data))
  return base64.replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "")
}

function base64UrlDecode(str: string) {
  const padded = str + "=".repeat((4 - (str.length % 4)) % 4)
  const base64 = padded.replace(/-/g, "+").replace(/_/g, "/")
  const binary = atob(base64)
  return new Uint8Array([...binary].map(c => c.charCodeAt(0)))
}

const toHex = (bytes: Uint8Array) => [...bytes].map(b => b.toString(16).padStart(2, "0")).join("")

function fromHex(hex: string) {
  if (!/^([0-9a-f]{2})+$/i.test(hex)) return null
  return new Uint8Array((hex.match(/.{2}/g) ?? []).map(b => parseInt(b, 16)))
}

async function getKey(secret: string): Promise<CryptoKey> {
  return crypto.subtle.importKey(
    "raw",
    encoder.encode(secret),
    { name: "HMAC", hash: "SHA-256" },
    false,
    ["sign", "verify"]
  )
}

const payloadSchema = z.object({
  sub: z.string(),
  email: z.string(),
  iss: z.string().optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
  type: z.enum(["access", "refresh"]).optional(),
  /** Session a refresh token belongs to */
  sid: z.string().optional(),
})

export type JWTPayload = z.infer<typeof payloadSchema>

export async function signJWT(
  payload: JWTPayload,
  secret: string,
  expiresIn: number = 3600
): Promise<string> {
  const now = Math.floor(Date.now() / 1000)
  const fullPayload = {
    ...payload,
    iss: ISSUER,
    iat: now,
    exp: now + expiresIn,
  }

  const header = base64UrlEncode(encoder.encode(JSON.stringify({ alg: "HS256", typ: "JWT" })))
  const body = base64UrlEncode(encoder.encode(JSON.stringify(fullPayload)))
  const signingInput = `${header}.${body}`

  const key = await getKey(secret)
  const signature = await crypto.subtle.sign("HMAC", key, encoder.encode(signingInput))

  return `${signingInput}.${base64UrlEncode(new Uint8Array(signature))}`
}

/** Payload of a valid, unexpired token, or null */
export async function verifyJWT(token: string, secret: string): Promise<JWTPayload | null> {
  const parts = token.split(".")
  if (parts.length !== 3) return null
  const [header, body, sig] = parts

  let decoded: unknown
  try {
    const key = await getKey(secret)
    const valid = await crypto.subtle.verify(
      "HMAC",
      key,
      base64UrlDecode(sig),
      encoder.encode(`${header}.${body}`)
    )
    if (!valid) return null
    decoded = JSON.parse(new TextDecoder().decode(base64UrlDecode(body)))
  } catch {
    // Malformed base64 or JSON is an invalid token
    return null
  }

  const result = payloadSchema.safeParse(decoded)
  if (!result.success) return null
  const payload = result.data

  const now = Math.floor(Date.now() / 1000)
  if (payload.exp && payload.exp < now) return null
  if (payload.iss && payload.iss !== ISSUER) return null

  return payload
}

async function derive(password: string, salt: BufferSource): Promise<Uint8Array> {
  const key = await crypto.subtle.importKey("raw", encoder.encode(password), "PBKDF2", false, ["deriveBits"])
  const hash = await crypto.subtle.deriveBits(
    { name: "PBKDF2", salt, iterations: PBKDF2_ITERATIONS, hash: "SHA-256" },
    key,
    256
  )
  return new Uint8Array(hash)
}

/**
 * Hash a password using PBKDF2 (Web Crypto)
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.getRandomValues(new Uint8Array(16))
  // Stored as salt:hash (both hex)
  return `${toHex(salt)}:${toHex(await derive(password, salt))}`
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [saltHex = "", hashHex = ""] = stored.split(":")
  const salt = fromHex(saltHex)
  if (!salt || !hashHex) return false
  const computed = toHex(await derive(password, salt))

  // Constant-time compare
  if (computed.length !== hashHex.length) return false
  let diff = 0
  for (let i = 0; i < computed.length; i++) diff |= computed.charCodeAt(i) ^ hashHex.charCodeAt(i)
  return diff === 0
}
