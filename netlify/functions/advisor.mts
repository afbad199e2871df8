/**
 * Ledgerwise - Advisor API (Netlify Serverless Function)
 *
 * Endpoints (via ?action= query param):
 *   POST ask     - ask a question about the saved profile
 *   GET  history - recorded exchanges, oldest first
 *   GET  export  - plain-text transcript
 */

import type { Config } from "@netlify/functions"
import { z } from "zod"
import { recentHistory } from "../../src/engine/ai-context.ts"
import { exportTranscript, MAX_QUESTION_LENGTH } from "../../src/engine/advisory-service.ts"
import { DEFAULT_HISTORY_LIMIT } from "../../src/engine/persistence.ts"
import { error, errorResponse, json, readBody } from "./_shared/http.mts"
import { authenticate, getServices } from "./_shared/services.mts"
import type { RequestContext, Services } from "./_shared/services.mts"

// Clients may resend a whole conversation; only the recent turns are used
const MAX_HISTORY_ITEMS = 500

const askSchema = z.object({
  question: z.string().trim().min(1, "Question is required").max(MAX_QUESTION_LENGTH),
  history: z.array(z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string().max(8000),
  })).max(MAX_HISTORY_ITEMS).default([]).transform(h => recentHistory(h)),
})

async function handleAsk(req: Request, ctx: RequestContext): Promise<Response> {
  const { question, history } = await readBody(req, askSchema)
  const outcome = await ctx.services.advisory.ask(ctx.userId, question, history)

  if (outcome.error) {
    return json({
      exchange: outcome.exchange,
      advisorError: { reason: outcome.error.reason, message: "Advice is unavailable right now. Your question was saved." },
    })
  }
  return json({ exchange: outcome.exchange })
}

function historyLimit(req: Request): number {
  const raw = Number(new URL(req.url).searchParams.get("limit"))
  return Number.isInteger(raw) && raw > 0 ? Math.min(raw, 200) : DEFAULT_HISTORY_LIMIT
}

async function handleHistory(req: Request, ctx: RequestContext): Promise<Response> {
  const exchanges = await ctx.services.profiles.listExchanges(ctx.userId, historyLimit(req))
  return json({ exchanges })
}

async function handleExport(ctx: RequestContext): Promise<Response> {
  const exchanges = await ctx.services.profiles.listExchanges(ctx.userId, 1000)
  return new Response(exportTranscript(exchanges), {
    headers: {
      "Content-Type": "text/plain; charset=utf-8",
      "Content-Disposition": 'attachment; filename="advisor-transcript.txt"',
    },
  })
}

export async function handleAdvisor(req: Request, services: Services): Promise<Response> {
  const action = new URL(req.url).searchParams.get("action") || ""
  try {
    const ctx = await authenticate(req, services, "Advisor")
    if (!ctx) return error("Not authenticated", 401, "AUTH_REQUIRED")

    switch (action) {
      case "ask":
        if (req.method !== "POST") return error("POST required", 405)
        return await handleAsk(req, ctx)
      case "history":
        return await handleHistory(req, ctx)
      case "export":
        return await handleExport(ctx)
      default:
        return error(`Unknown action: ${action}`, 400)
    }
  } catch (e) {
    return errorResponse(e, services.logger("Advisor"))
  }
}

export default async (req: Request) => handleAdvisor(req, getServices())

export const config: Config = {
  path: "/api/advisor",
}
