/**
 * Ledgerwise - Server Configuration
 * Environment variables parsed once per cold start.
 */

import { z } from "zod"

const blank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v)
const optionalText = z.preprocess(blank, z.string().optional())

const DEV_JWT_SECRET = "ledgerwise-dev-secret-change-me"

const envSchema = z.object({
  JWT_SECRET: optionalText,
  GEMINI_API_KEY: optionalText,
  GEMINI_MODEL: z.preprocess(blank, z.string().default("gemini-1.5-flash")),
  ADVISOR_BACKEND: z.preprocess(blank, z.enum(["gemini", "offline"]).optional()),
  ADVISOR_TIMEOUT_MS: z.preprocess(blank, z.coerce.number().int().positive().default(15000)),
  ADVISOR_MAX_RETRIES: z.preprocess(blank, z.coerce.number().int().min(0).max(5).default(2)),
  STORE_BACKEND: z.preprocess(blank, z.enum(["memory", "blobs"]).optional()),
  STORE_TIMEOUT_MS: z.preprocess(blank, z.coerce.number().int().positive().default(5000)),
  LOG_LEVEL: z.preprocess(blank, z.enum(["debug", "info", "warn", "error"]).default("info")),
  ADMIN_TOKEN: optionalText,
  // Set by Netlify at runtime
  CONTEXT: optionalText,
  SITE_ID: optionalText,
  NETLIFY_BLOBS_CONTEXT: optionalText,
})

export interface ServerConfig {
  jwtSecret: string
  advisor: {
    backend: "gemini" | "offline"
    apiKey?: string
    model: string
    timeoutMs: number
    maxRetries: number
  }
  store: {
    backend: "memory" | "blobs"
    timeoutMs: number
  }
  logLevel: "debug" | "info" | "warn" | "error"
  /** Required for model training; training is disabled without it */
  adminToken?: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")
    throw new ConfigError(`Invalid environment: ${issues}`)
  }
  const e = result.data

  const production = e.CONTEXT === "production"
  if (production && !e.JWT_SECRET) {
    throw new ConfigError("JWT_SECRET must be set in production")
  }

  const advisorBackend = e.ADVISOR_BACKEND ?? (e.GEMINI_API_KEY ? "gemini" : "offline")
  if (advisorBackend === "gemini" && !e.GEMINI_API_KEY) {
    throw new ConfigError("ADVISOR_BACKEND=gemini requires GEMINI_API_KEY")
  }

  const onNetlify = Boolean(e.SITE_ID || e.NETLIFY_BLOBS_CONTEXT)

  const config: ServerConfig = {
    jwtSecret: e.JWT_SECRET ?? DEV_JWT_SECRET,
    advisor: {
      backend: advisorBackend,
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      timeoutMs: e.ADVISOR_TIMEOUT_MS,
      maxRetries: e.ADVISOR_MAX_RETRIES,
    },
    store: {
      backend: e.STORE_BACKEND ?? (onNetlify ? "blobs" : "memory"),
      timeoutMs: e.STORE_TIMEOUT_MS,
    },
    logLevel: e.LOG_LEVEL,
    adminToken: e.ADMIN_TOKEN,
  }
  return Object.freeze(config)
}
