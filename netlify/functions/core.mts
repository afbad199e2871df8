/**
 * Ledgerwise - Core API (Health Check)
 */

import type { Config } from "@netlify/functions"
import { getServices } from "./_shared/services.mts"
import type { Services } from "./_shared/services.mts"

export async function handleCore(req: Request, services: Services): Promise<Response> {
  const url = new URL(req.url)
  const action = url.searchParams.get("action") || "health"

  if (action === "health" || action === "ping") {
    return new Response(JSON.stringify({
      status: "ok",
      version: "1.0.0",
      platform: "netlify-functions",
      storage: services.config.store.backend,
      advisor: services.advisor.id,
      timestamp: new Date().toISOString(),
    }), {
      headers: { "Content-Type": "application/json" },
    })
  }

  return new Response(JSON.stringify({ error: true, message: `Unknown action: ${action}` }), {
    status: 400,
    headers: { "Content-Type": "application/json" },
  })
}

export default async (req: Request) => handleCore(req, getServices())

export const config: Config = {
  path: "/api/health",
}
