/**
 * Ledgerwise - Service wiring
 *
 * Chooses the store and advisor implementations from configuration and
 * builds the request-scoped context each handler works with.
 */

import { AdvisoryService } from "../../../src/engine/advisory-service.ts"
import { GeminiAdvisor, OfflineAdvisor } from "../../../src/engine/ai-providers.ts"
import type { AdvisoryProvider } from "../../../src/engine/ai-providers.ts"
import { createLogger } from "../../../src/engine/logger.ts"
import type { Logger } from "../../../src/engine/logger.ts"
import { ModelRegistry } from "../../../src/engine/model-registry.ts"
import { MemoryDocumentStore, ProfileRepository, withStoreTimeout } from "../../../src/engine/persistence.ts"
import type { DocumentStore } from "../../../src/engine/persistence.ts"
import type { Sleep } from "../../../src/engine/resilience.ts"
import { BlobDocumentStore } from "./blob-store.mts"
import { loadConfig } from "./config.mts"
import type { ServerConfig } from "./config.mts"
import { verifyJWT } from "./jwt.mts"

export type StoreName = "users" | "profiles" | "models"

export interface Services {
  config: ServerConfig
  users: DocumentStore
  profiles: ProfileRepository
  models: ModelRegistry
  advisor: AdvisoryProvider
  advisory: AdvisoryService
  logger(tag: string): Logger
}

export interface ServiceOverrides {
  /** Replace the backing store for every StoreName */
  storeFactory?: (name: StoreName) => DocumentStore
  fetch?: typeof fetch
  sleep?: Sleep
  now?: () => Date
}

function defaultStoreFactory(config: ServerConfig): (name: StoreName) => DocumentStore {
  if (config.store.backend === "blobs") return name => new BlobDocumentStore(`ledgerwise-${name}`)
  return () => new MemoryDocumentStore()
}

export function createServices(config: ServerConfig, overrides: ServiceOverrides = {}): Services {
  const logger = (tag: string) => createLogger(tag, config.logLevel)
  const makeStore = overrides.storeFactory ?? defaultStoreFactory(config)
  const bounded = (name: StoreName) => withStoreTimeout(makeStore(name), config.store.timeoutMs)

  const profiles = new ProfileRepository(bounded("profiles"), { log: logger("Profile"), now: overrides.now })
  const models = new ModelRegistry(bounded("models"), logger("Models"), overrides.now)

  const advisor: AdvisoryProvider = config.advisor.backend === "gemini"
    ? new GeminiAdvisor({
      apiKey: config.advisor.apiKey ?? "",
      model: config.advisor.model,
      timeoutMs: config.advisor.timeoutMs,
      maxRetries: config.advisor.maxRetries,
      fetch: overrides.fetch,
      sleep: overrides.sleep,
      log: logger("Advisor"),
    })
    : new OfflineAdvisor()

  const advisory = new AdvisoryService({ profiles, models, advisor, log: logger("Advisor"), now: overrides.now })

  logger("Services").debug(`store=${config.store.backend} advisor=${advisor.id}`)
  return { config, users: bounded("users"), profiles, models, advisor, advisory, logger }
}

// ─── Cold-start singleton ─────────────────────────────────────────────────

let services: Services | null = null

/** Services for this function instance, created on first use */
export function getServices(): Services {
  if (!services) services = createServices(loadConfig())
  return services
}

// ─── Request Context ──────────────────────────────────────────────────────

export interface RequestContext {
  userId: string
  email: string
  services: Services
  log: Logger
}

/** Context for an authenticated request, or null without a valid access token */
export async function authenticate(req: Request, services: Services, tag: string): Promise<RequestContext | null> {
  const auth = req.headers.get("authorization")
  if (!auth?.startsWith("Bearer ")) return null
  const payload = await verifyJWT(auth.slice(7), services.config.jwtSecret)
  if (!payload || payload.type === "refresh") return null
  return { userId: payload.sub, email: payload.email, services, log: services.logger(tag) }
}
